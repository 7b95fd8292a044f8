import { describe, it } from "mocha";
import { expect } from "chai";
import { createTypeDescriptor, identityOwnerPathNormalizer } from "@recname/core";
import { record } from "./annotations.js";
import { describeClass, resolveClassName } from "./describe.js";

class Pair<A, B> {
  constructor(
    readonly first: A,
    readonly second: B
  ) {}
}

class Point {}

describe("describeClass", () => {
  it("should use the class name and the given owner path", () => {
    const result = describeClass(Point, { ownerPath: "com.example" });
    expect(result).to.deep.equal({
      ok: true,
      value: { shortName: "Point", ownerPath: "com.example", typeArguments: [] },
    });
  });

  it("should default to an empty owner path", () => {
    const result = describeClass(Point);
    expect(result.ok && result.value.ownerPath).to.equal("");
  });

  it("should describe primitive, class and descriptor type arguments", () => {
    const result = describeClass(Pair, {
      ownerPath: "com.example",
      typeArguments: ["number", Point, createTypeDescriptor("List", "app")],
    });
    expect(result.ok).to.be.true;
    if (result.ok) {
      expect(result.value.typeArguments).to.deep.equal([
        { shortName: "number", ownerPath: "", typeArguments: [] },
        { shortName: "Point", ownerPath: "", typeArguments: [] },
        { shortName: "List", ownerPath: "app", typeArguments: [] },
      ]);
    }
  });

  it("should reject an anonymous class", () => {
    const result = describeClass(makeAnonymous(), { ownerPath: "com.example" });
    expect(result.ok).to.be.false;
    if (!result.ok) {
      expect(result.error.code).to.equal("RN1001");
    }
  });

  it("should reject an anonymous class as a type argument", () => {
    const result = describeClass(Pair, {
      typeArguments: [makeAnonymous(), "string"],
    });
    expect(result.ok).to.be.false;
  });
});

describe("resolveClassName", () => {
  it("should encode type arguments", () => {
    const result = resolveClassName(Pair, {
      ownerPath: "com.example",
      typeArguments: ["number", "string"],
    });
    expect(result).to.deep.equal({
      ok: true,
      value: {
        namespace: "com.example",
        name: "Pair__number_string",
        fullName: "com.example.Pair__number_string",
      },
    });
  });

  it("should apply annotations", () => {
    class Envelope<T> {
      constructor(readonly payload: T) {}
    }
    record.on(Envelope).erased().namespace("events");

    const result = resolveClassName(Envelope, {
      ownerPath: "com.example",
      typeArguments: ["string"],
    });
    expect(result.ok && result.value.fullName).to.equal("events.Envelope");
  });

  it("should let a name annotation win over erasure", () => {
    class Message<T> {
      constructor(readonly body: T) {}
    }
    record.on(Message).erased().name("Msg").namespace(" ");

    const result = resolveClassName(Message, { typeArguments: ["string"] });
    expect(result.ok && result.value).to.deep.equal({
      namespace: " ",
      name: "Msg",
      fullName: "Msg",
    });
  });

  it("should normalize the owner path", () => {
    const result = resolveClassName(Point, {
      ownerPath: "com.example.<local setup>",
    });
    expect(result.ok && result.value.namespace).to.equal("com.example");
  });

  it("should take a caller supplied normalizer", () => {
    const result = resolveClassName(Point, {
      ownerPath: "com.example.package",
      normalizeOwnerPath: identityOwnerPathNormalizer,
    });
    expect(result.ok && result.value.fullName).to.equal(
      "com.example.package.Point"
    );
  });
});

// Classes created inside an array literal get no inferred name
function makeAnonymous(): new () => object {
  return [class {}][0] ?? class {};
}
