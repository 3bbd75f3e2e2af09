import { describe, it, expect } from "@jest/globals";
import {
  normalizePagination,
  paginate,
  parsePaginationQuery,
} from "../../src/utils/pagination";
import { ValidationError } from "../../src/utils/errors";

describe("normalizePagination", () => {
  it("defaults to skip 0 and limit 10", () => {
    expect(normalizePagination()).toEqual({ skip: 0, limit: 10 });
  });

  it("caps limit at 100 without complaining", () => {
    expect(normalizePagination({ limit: 500 })).toEqual({ skip: 0, limit: 100 });
    expect(normalizePagination({ limit: 100 })).toEqual({ skip: 0, limit: 100 });
  });

  it("raises limit below 1 to 1", () => {
    expect(normalizePagination({ limit: 0 }).limit).toBe(1);
    expect(normalizePagination({ limit: -5 }).limit).toBe(1);
  });

  it("rejects a negative skip", () => {
    expect(() => normalizePagination({ skip: -1 })).toThrow(ValidationError);
  });
});

describe("parsePaginationQuery", () => {
  it("parses integer strings", () => {
    expect(parsePaginationQuery({ skip: "20", limit: "5" })).toEqual({
      skip: 20,
      limit: 5,
    });
  });

  it("rejects values that are not integers", () => {
    expect(() => parsePaginationQuery({ limit: "ten" })).toThrow(
      "limit must be an integer",
    );
    expect(() => parsePaginationQuery({ skip: "1.5" })).toThrow(
      "skip must be an integer",
    );
  });
});

describe("paginate", () => {
  const items = Array.from({ length: 100 }, (_, i) => i + 1);

  it("returns the tail when the window runs past the end", () => {
    expect(paginate(items, { skip: 90, limit: 20 })).toEqual([
      91, 92, 93, 94, 95, 96, 97, 98, 99, 100,
    ]);
  });

  it("returns nothing when skip is at or past the end", () => {
    expect(paginate(items, { skip: 100, limit: 10 })).toEqual([]);
    expect(paginate(items, { skip: 250, limit: 10 })).toEqual([]);
  });
});
