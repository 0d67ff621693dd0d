import { describe, expect, it } from "vitest";
import { SeededRandom } from "@gridstash/shared";
import { GridInventory, Item } from "../src/index.js";
import { expectedMatrix } from "./helpers.js";

const WIDTH = 8;
const HEIGHT = 6;

function createPool(rng: SeededRandom): Item[] {
  return Array.from({ length: 14 }, (_, i) => new Item(`item-${i}`, rng.nextIntRange(1, 3), rng.nextIntRange(1, 3)));
}

function runOperations(seed: number, steps: number): void {
  const rng = new SeededRandom(seed);
  const pool = createPool(rng);
  const inventory = new GridInventory(WIDTH, HEIGHT);

  for (let step = 0; step < steps; step++) {
    const item = rng.pick(pool);
    const x = rng.nextIntRange(-1, WIDTH);
    const y = rng.nextIntRange(-1, HEIGHT);
    const before = inventory.toMatrix();

    switch (rng.nextInt(6)) {
      case 0:
        inventory.place(item, x, y);
        break;
      case 1:
        inventory.placeAnywhere(item);
        break;
      case 2:
        inventory.remove(item);
        break;
      case 3:
        if (!inventory.moveItem(item, x, y)) {
          expect(inventory.toMatrix()).toEqual(before);
        }
        break;
      case 4:
        if (rng.nextInt(10) === 0) inventory.reorganizeSpace();
        break;
      default:
        if (rng.nextInt(20) === 0) inventory.clear();
        break;
    }

    expect(inventory.toMatrix()).toEqual(expectedMatrix(inventory));
    expect([...inventory]).toHaveLength(inventory.count);
  }
}

describe("GridInventory invariants", () => {
  it.each([1, 7, 42, 2024])("keeps footprints stamped and disjoint (seed %i)", (seed) => {
    runOperations(seed, 300);
  });

  it("never places an item where the grid reports another", () => {
    const rng = new SeededRandom(5);
    const inventory = new GridInventory(WIDTH, HEIGHT);

    for (const item of createPool(rng)) {
      inventory.placeAnywhere(item);
    }

    for (const { item } of inventory.placements()) {
      for (const cell of inventory.getFootprint(item)) {
        expect(inventory.getItemAt(cell)).toBe(item);
      }
    }
  });
});
