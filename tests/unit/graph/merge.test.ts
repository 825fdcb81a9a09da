/**
 * Unit tests for entity and relation deduplication
 */

import { describe, test, expect } from "vitest";
import {
  entityKey,
  relationKey,
  mergeByKey,
  mergeEntities,
  mergeRelations,
} from "../../../src/graph/merge.js";
import { keysOf, makeEntity, makeRelation } from "../../helpers/pipeline-fakes.js";

describe("identity keys", () => {
  test("entity key ignores name case but not type", () => {
    expect(entityKey(makeEntity("Person", "Tom Hanks"))).toBe(entityKey(makeEntity("Person", "TOM HANKS")));
    expect(entityKey(makeEntity("Person", "Big"))).not.toBe(entityKey(makeEntity("Movie", "Big")));
  });

  test("relation key covers type and both endpoints", () => {
    expect(relationKey(makeRelation("ACTED_IN", "Tom Hanks", "Big"))).toBe(
      relationKey(makeRelation("ACTED_IN", "tom hanks", "BIG"))
    );
    expect(relationKey(makeRelation("ACTED_IN", "Tom Hanks", "Big"))).not.toBe(
      relationKey(makeRelation("DIRECTED", "Tom Hanks", "Big"))
    );
  });
});

describe("mergeEntities", () => {
  test("keeps first-seen order and the first spelling", () => {
    const merged = mergeEntities([
      makeEntity("Person", "Tom Hanks"),
      makeEntity("Movie", "Big"),
      makeEntity("Person", "tom hanks"),
      makeEntity("Movie", "Splash"),
    ]);

    expect(keysOf(merged)).toEqual(["Person:tom hanks", "Movie:big", "Movie:splash"]);
    expect(merged[0]?.name).toBe("Tom Hanks");
  });

  test("unions properties with the later record winning", () => {
    const [merged] = mergeEntities([
      makeEntity("Person", "Tom Hanks", { properties: { born: 1956, role: "actor" } }),
      makeEntity("Person", "Tom Hanks", { properties: { role: "director", awards: 2 } }),
    ]);

    expect(merged?.properties).toEqual({ born: 1956, role: "director", awards: 2 });
  });

  test("averages confidence pairwise", () => {
    const [merged] = mergeEntities([
      makeEntity("Person", "Tom Hanks", { confidence: 0.9 }),
      makeEntity("Person", "Tom Hanks", { confidence: 0.1 }),
      makeEntity("Person", "Tom Hanks", { confidence: 0.1 }),
    ]);

    expect(merged?.confidence).toBeCloseTo(0.3);
  });

  test("is idempotent", () => {
    const once = mergeEntities([
      makeEntity("Person", "Tom Hanks", { properties: { born: 1956 } }),
      makeEntity("Person", "TOM HANKS", { properties: { role: "actor" }, confidence: 0.5 }),
      makeEntity("Movie", "Big"),
    ]);

    expect(mergeEntities(once)).toEqual(once);
  });

  test("does not mutate its input", () => {
    const first = makeEntity("Person", "Tom Hanks", { properties: { born: 1956 } });
    mergeEntities([first, makeEntity("Person", "Tom Hanks", { properties: { role: "actor" } })]);

    expect(first.properties).toEqual({ born: 1956 });
    expect(first.confidence).toBe(0.9);
  });

  test("returns an empty list for no input", () => {
    expect(mergeEntities([])).toEqual([]);
  });
});

describe("mergeRelations", () => {
  test("merges relations with the same type and endpoints", () => {
    const merged = mergeRelations([
      makeRelation("ACTED_IN", "Tom Hanks", "Big", { properties: { role: "Josh" }, confidence: 0.6 }),
      makeRelation("ACTED_IN", "tom hanks", "big", { properties: { year: 1988 }, confidence: 1 }),
      makeRelation("DIRECTED", "Penny Marshall", "Big"),
    ]);

    expect(merged).toHaveLength(2);
    expect(merged[0]?.properties).toEqual({ role: "Josh", year: 1988 });
    expect(merged[0]?.confidence).toBeCloseTo(0.8);
    expect(merged[0]?.fromEntity).toBe("Tom Hanks");
  });
});

describe("mergeByKey", () => {
  test("reduces repeats with the supplied merge", () => {
    const totals = mergeByKey(
      [
        { key: "a", n: 1 },
        { key: "b", n: 2 },
        { key: "a", n: 3 },
      ],
      (item) => item.key,
      (kept, incoming) => ({ key: kept.key, n: kept.n + incoming.n })
    );

    expect(totals).toEqual([
      { key: "a", n: 4 },
      { key: "b", n: 2 },
    ]);
  });
});
