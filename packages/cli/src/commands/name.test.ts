/**
 * Tests for name command
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { nameRecord } from "./name.js";

describe("Name Command", () => {
  describe("nameRecord", () => {
    it("should encode type arguments into the default name", () => {
      const result = nameRecord("Pair", {
        owner: "com.acme",
        typeArguments: ["number", "string"],
      });
      expect(result).to.deep.equal({
        ok: true,
        value: {
          namespace: "com.acme",
          name: "Pair__number_string",
          fullName: "com.acme.Pair__number_string",
        },
      });
    });

    it("should split a dotted type name when no owner is given", () => {
      const result = nameRecord("com.acme.models.Box", {});
      expect(result.ok && result.value.fullName).to.equal("com.acme.models.Box");
      expect(result.ok && result.value.namespace).to.equal("com.acme.models");
    });

    it("should use only the short name of qualified type arguments", () => {
      const result = nameRecord("Box", {
        owner: "com.acme",
        typeArguments: ["com.other.Item"],
      });
      expect(result.ok && result.value.name).to.equal("Box__Item");
    });

    it("should keep a dotted short name whole when an owner is given", () => {
      const result = nameRecord("a.b", { owner: "" });
      expect(result.ok && result.value.fullName).to.equal("a.b");
      expect(result.ok && result.value.namespace).to.equal("");
    });

    it("should strip local markers and the package suffix from the owner", () => {
      const result = nameRecord("Inner", {
        owner: "com.example.<local MyMethod>.inner.package",
      });
      expect(result.ok && result.value.fullName).to.equal("com.example.inner.Inner");
    });

    it("should drop type arguments when erased", () => {
      const result = nameRecord("Pair", {
        owner: "com.acme",
        typeArguments: ["number"],
        erased: true,
      });
      expect(result.ok && result.value.name).to.equal("Pair");
    });

    it("should apply name and namespace overrides verbatim", () => {
      const result = nameRecord("Pair", {
        owner: "com.acme",
        typeArguments: ["number"],
        recordName: "Tuple",
        recordNamespace: "",
      });
      expect(result).to.deep.equal({
        ok: true,
        value: { namespace: "", name: "Tuple", fullName: "Tuple" },
      });
    });

    it("should require a type name", () => {
      expect(nameRecord(undefined, {})).to.deep.equal({
        ok: false,
        error: "Type name required",
      });
    });

    it("should reject an empty short name", () => {
      const result = nameRecord("com.acme.", {});
      expect(result.ok).to.be.false;
      if (!result.ok) {
        expect(result.error).to.match(/^error RN1001: /);
      }
    });
  });
});
