/**
 * Tests for Result type
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { ok, error, map, flatMap, unwrapOr, sequence } from "./result.js";

describe("Result", () => {
  describe("ok and error constructors", () => {
    it("should create ok result", () => {
      expect(ok<number, string>(42)).to.deep.equal({ ok: true, value: 42 });
    });

    it("should create error result", () => {
      expect(error<number, string>("Something went wrong")).to.deep.equal({
        ok: false,
        error: "Something went wrong",
      });
    });
  });

  describe("map", () => {
    it("should map ok value", () => {
      expect(map(ok<number, string>(5), (x) => x * 2)).to.deep.equal({
        ok: true,
        value: 10,
      });
    });

    it("should pass through error", () => {
      expect(map(error<number, string>("Error"), (x) => x * 2)).to.deep.equal({
        ok: false,
        error: "Error",
      });
    });
  });

  describe("flatMap", () => {
    const half = (x: number) =>
      x % 2 === 0 ? ok<number, string>(x / 2) : error<number, string>("odd");

    it("should chain ok results", () => {
      expect(flatMap(ok<number, string>(8), half)).to.deep.equal({
        ok: true,
        value: 4,
      });
    });

    it("should return the error of the chained step", () => {
      expect(flatMap(ok<number, string>(3), half)).to.deep.equal({
        ok: false,
        error: "odd",
      });
    });
  });

  describe("unwrapOr", () => {
    it("should return the value or the default", () => {
      expect(unwrapOr(ok<number, string>(1), 0)).to.equal(1);
      expect(unwrapOr(error<number, string>("Error"), 0)).to.equal(0);
    });
  });

  describe("sequence", () => {
    it("should collect every value", () => {
      expect(
        sequence([ok<number, string>(1), ok<number, string>(2)])
      ).to.deep.equal({ ok: true, value: [1, 2] });
    });

    it("should stop at the first error", () => {
      expect(
        sequence([
          ok<number, string>(1),
          error<number, string>("first"),
          error<number, string>("second"),
        ])
      ).to.deep.equal({ ok: false, error: "first" });
    });
  });
});
