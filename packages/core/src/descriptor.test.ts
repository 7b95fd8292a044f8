import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createTypeDescriptor,
  formatTypeDescriptor,
  validateTypeDescriptor,
} from "./descriptor.js";
import { formatDiagnostic } from "./types/diagnostic.js";

describe("validateTypeDescriptor", () => {
  it("should accept a named descriptor", () => {
    const descriptor = createTypeDescriptor("List", "com.example");
    const result = validateTypeDescriptor(descriptor);
    expect(result.ok).to.be.true;
    if (result.ok) {
      expect(result.value).to.equal(descriptor);
    }
  });

  it("should reject an empty short name", () => {
    const result = validateTypeDescriptor(createTypeDescriptor("", "app"));
    expect(result.ok).to.be.false;
    if (!result.ok) {
      expect(result.error.code).to.equal("RN1001");
      expect(result.error.message).to.equal(
        "Type descriptor owned by 'app' has an empty short name"
      );
    }
  });

  it("should reject a whitespace short name", () => {
    expect(validateTypeDescriptor(createTypeDescriptor("  ")).ok).to.be.false;
  });

  it("should reject an unnamed type argument", () => {
    const result = validateTypeDescriptor(
      createTypeDescriptor("Box", "app", [createTypeDescriptor("")])
    );
    expect(result.ok).to.be.false;
    if (!result.ok) {
      expect(formatDiagnostic(result.error)).to.equal(
        "error RN1001: Type descriptor has an empty short name Hint: Anonymous classes and unnamed types cannot carry a record name"
      );
    }
  });
});

describe("formatTypeDescriptor", () => {
  it("should render the qualified name with type arguments", () => {
    const descriptor = createTypeDescriptor("Pair", "app.models", [
      createTypeDescriptor("number"),
      createTypeDescriptor("List", "app", [createTypeDescriptor("string")]),
    ]);
    expect(formatTypeDescriptor(descriptor)).to.equal(
      "app.models.Pair<number, app.List<string>>"
    );
  });

  it("should render a top-level type by its short name", () => {
    expect(formatTypeDescriptor(createTypeDescriptor("Top"))).to.equal("Top");
  });
});
