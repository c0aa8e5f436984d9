import { createRandom, createSeededRandom, randomIndex, shuffle, systemRandom } from "./random";

describe("createSeededRandom", () => {
  it("produces the same sequence for the same seed", () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);
    const first = [a.next(), a.next(), a.next()];

    expect([b.next(), b.next(), b.next()]).toEqual(first);
  });

  it("produces different sequences for different seeds", () => {
    expect(createSeededRandom(1).next()).not.toBe(createSeededRandom(2).next());
  });

  it("stays within [0, 1)", () => {
    const random = createSeededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const value = random.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe("createRandom", () => {
  it("uses the system source without a seed", () => {
    expect(createRandom()).toBe(systemRandom);
    expect(createRandom(null)).toBe(systemRandom);
  });

  it("uses a seeded source when given a seed", () => {
    expect(createRandom(5).next()).toBe(createSeededRandom(5).next());
  });
});

describe("randomIndex", () => {
  it("never reaches the length", () => {
    expect(randomIndex({ next: () => 0.9999999999 }, 3)).toBe(2);
    expect(randomIndex({ next: () => 0 }, 3)).toBe(0);
  });
});

describe("shuffle", () => {
  it("returns a permutation without touching the input", () => {
    const items = [1, 2, 3, 4, 5, 6];
    const shuffled = shuffle(items, createSeededRandom(3));

    expect(items).toEqual([1, 2, 3, 4, 5, 6]);
    expect([...shuffled].sort((a, b) => a - b)).toEqual(items);
  });

  it("is reproducible with a seed", () => {
    const items = ["a", "b", "c", "d", "e"];
    expect(shuffle(items, createSeededRandom(9))).toEqual(shuffle(items, createSeededRandom(9)));
  });
});
