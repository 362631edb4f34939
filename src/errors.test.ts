import { describe, it, expect } from "vitest";
import {
  InvalidGeometryError,
  AreaNotFoundError,
  AreaConflictError,
  InvalidRequestError,
  StorageError,
  HydrationError,
  PersistenceError,
} from "./errors.js";

describe("Error classes", () => {
  const errorCases: Array<[string, new (msg: string) => Error]> = [
    ["InvalidGeometryError", InvalidGeometryError],
    ["AreaNotFoundError", AreaNotFoundError],
    ["AreaConflictError", AreaConflictError],
    ["InvalidRequestError", InvalidRequestError],
    ["StorageError", StorageError],
    ["HydrationError", HydrationError],
    ["PersistenceError", PersistenceError],
  ];

  for (const [name, ErrorClass] of errorCases) {
    describe(name, () => {
      it("is instanceof Error", () => {
        const err = new ErrorClass("test message");
        expect(err).toBeInstanceOf(Error);
      });

      it("is instanceof its own class", () => {
        const err = new ErrorClass("test message");
        expect(err).toBeInstanceOf(ErrorClass);
      });

      it("has correct .name property", () => {
        const err = new ErrorClass("test message");
        expect(err.name).toBe(name);
      });

      it("carries the provided message", () => {
        const msg = `error in ${name}`;
        const err = new ErrorClass(msg);
        expect(err.message).toBe(msg);
      });
    });
  }

  describe("instanceof checks across catch boundaries", () => {
    it("HydrationError can be caught as Error and checked", () => {
      try {
        throw new HydrationError("storage offline");
      } catch (e) {
        expect(e).toBeInstanceOf(Error);
        expect(e).toBeInstanceOf(HydrationError);
        expect((e as Error).name).toBe("HydrationError");
      }
    });
  });

  describe("different error types are distinct classes", () => {
    it("AreaConflictError is not instanceof AreaNotFoundError", () => {
      const err = new AreaConflictError("area 'b' already exists");
      expect(err).not.toBeInstanceOf(AreaNotFoundError);
    });

    it("PersistenceError is not instanceof HydrationError", () => {
      const err = new PersistenceError("read-only");
      expect(err).not.toBeInstanceOf(HydrationError);
    });
  });
});
