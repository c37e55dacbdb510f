import { expect } from "vitest";

// node-fetch's Headers proxy throws when vitest's iterable equality reads
// `size` on Node >= 19; identical references are equal without inspection.
expect.addEqualityTesters([(a: unknown, b: unknown) => (Object.is(a, b) ? true : undefined)]);
