import { describe, expect, it } from "vitest";
import {
  ConflictError,
  type DevinfoError,
  ExternalError,
  InternalError,
  NotFoundError,
  ReportRegistrationError,
  StateLockDeadlockError,
  ValidationError,
} from "../../index.js";

describe("Exhaustive type checking with _tag discriminant", () => {
  function handleError(error: DevinfoError): string {
    switch (error._tag) {
      case "ValidationError":
        return "validation";
      case "NotFoundError":
        return "not_found";
      case "ConflictError":
        return "conflict";
      case "ExternalError":
        return "external";
      case "InternalError":
        return "internal";
      default: {
        const exhaustive: never = error._tag;
        throw new Error(`Unhandled tag: ${String(exhaustive)}`);
      }
    }
  }

  it("should switch on every base _tag value", () => {
    expect(handleError(new ValidationError("test", []))).toBe("validation");
    expect(handleError(new NotFoundError("Report", "vm"))).toBe("not_found");
    expect(handleError(new ConflictError("conflict"))).toBe("conflict");
    expect(handleError(new ExternalError("external fail"))).toBe("external");
    expect(handleError(new InternalError("internal fail"))).toBe("internal");
  });

  it("should route domain errors through their base tag", () => {
    expect(handleError(new ReportRegistrationError("/dri/0", "vm", []))).toBe("external");
    expect(handleError(new StateLockDeadlockError(5))).toBe("internal");
  });
});
