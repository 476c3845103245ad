import { describe, it, expect } from "vitest";
import {
  Boxed,
  Ref,
  TypeMismatch,
  box,
  builtinToken,
  describeValue,
  isPortableTag,
  t,
  tagOf,
  unbox,
} from "../../src/reflect";

describe("Boxed", () => {
  describe("Happy Path", () => {
    it("recovers a value under its own tag", () => {
      expect(unbox(t.int, box(t.int, 42))).toBe(42);
      expect(unbox(t.string, box(t.string, "Toto"))).toBe("Toto");
      expect(unbox(t.bool, box(t.bool, false))).toBe(false);
      expect(unbox(t.char, box(t.char, "x"))).toBe("x");
    });

    it("reports its tag", () => {
      const b = box(t.double, 1.65);
      expect(b.tag).toBe("double");
      expect(b.is(t.double)).toBe(true);
      expect(b.is(t.int)).toBe(false);
    });

    it("treats the void box as empty", () => {
      expect(Boxed.empty.isEmpty()).toBe(true);
      expect(Boxed.empty.tag).toBe("void");
      expect(box(t.int, 0).isEmpty()).toBe(false);
    });

    it("copies vectors in and out", () => {
      const trips = [1, 2];
      const b = box(t.vector(t.int), trips);
      trips.push(3);

      const out = b.as(t.vector(t.int));
      expect(out).toEqual([1, 2]);
      out.push(9);
      expect(b.as(t.vector(t.int))).toEqual([1, 2]);
    });

    it("shares the cell behind a pointer tag", () => {
      const cell = new Ref(1.5);
      const b = box(t.ptr(t.double), cell);
      expect(b.tag).toBe("double*");
      expect(b.as(t.ptr(t.double))).toBe(cell);
    });

    it("encodes scalars for JSON export", () => {
      expect(box(t.int, 3).toJson(t.int)).toBe(3);
      expect(box(t.string, "a").toJson(t.string)).toBe("a");
      expect(box(t.bool, true).toJson(t.bool)).toBe(true);
      expect(box(t.vector(t.int), [1]).toJson(t.vector(t.int))).toBeNull();
    });

    it("renders a short description", () => {
      expect(box(t.string, "hi").toString()).toBe('Boxed<string>(string("hi"))');
      expect(Boxed.empty.toString()).toBe("Boxed<void>(undefined)");
    });
  });

  describe("Edge Cases", () => {
    it("rejects a value that does not fit the tag on the way in", () => {
      expect(() => box(t.int, 1.5)).toThrow(TypeMismatch);
      expect(() => box(t.int, 1.5)).toThrow("TypeMismatch: expected int, got number(1.5)");
      expect(() => box(t.int, 2 ** 31)).toThrow(TypeMismatch);
      expect(() => box(t.char, "ab")).toThrow(TypeMismatch);
      expect(() => box(t.float, 0.1)).toThrow(TypeMismatch);
      expect(box(t.float, 0.5).as(t.float)).toBe(0.5);
    });

    it("never converts between tags on the way out", () => {
      expect(() => unbox(t.double, box(t.int, 1))).toThrow("TypeMismatch: expected double, got int");
      expect(() => unbox(t.string, box(t.char, "c"))).toThrow(TypeMismatch);
    });

    it("names the context in the message", () => {
      expect(() => box(t.int, 1).as(t.bool, "Person.isActive")).toThrow(
        "TypeMismatch: expected bool, got int (Person.isActive)"
      );
    });

    it("encodes non-finite numbers and foreign tokens as null", () => {
      expect(box(t.double, Infinity).toJson(t.double)).toBeNull();
      expect(box(t.double, NaN).toJson(t.double)).toBeNull();
      expect(box(t.int, 3).toJson(t.double)).toBeNull();
    });
  });
});

describe("type tokens", () => {
  it("maps each token to its canonical tag", () => {
    expect(tagOf(t.int)).toBe("int");
    expect(tagOf(t.vector(t.string))).toBe("vector<string>");
    expect(tagOf(t.ptr(t.vector(t.double)))).toBe("vector<double>*");
  });

  it("resolves builtin tags", () => {
    expect(builtinToken("int")?.tag).toBe("int");
    expect(builtinToken("int*")?.tag).toBe("int*");
    expect(builtinToken("vector<double>")?.tag).toBe("vector<double>");
    expect(builtinToken("vector<vector<int>>")?.tag).toBe("vector<vector<int>>");
  });

  it("has no token for void pointers, opaque and unknown tags", () => {
    expect(builtinToken("void*")).toBeUndefined();
    expect(builtinToken("vector<void>")).toBeUndefined();
    expect(builtinToken("opaque:Point")).toBeUndefined();
    expect(builtinToken("long")).toBeUndefined();
  });

  it("keeps opaque tokens out of the portable set", () => {
    const point = t.opaque("Point", (v: unknown): v is { x: number } =>
      typeof v === "object" && v !== null && typeof Reflect.get(v, "x") === "number"
    );
    expect(point.tag).toBe("opaque:Point");
    expect(point.portable).toBe(false);
    expect(isPortableTag(point.tag)).toBe(false);
    expect(box(point, { x: 1 }).as(point)).toEqual({ x: 1 });
    expect(box(point, { x: 1 }).toJson(point)).toBeNull();
  });

  it("describes values for diagnostics", () => {
    expect(describeValue(undefined)).toBe("undefined");
    expect(describeValue([1, 2])).toBe("array(2)");
    expect(describeValue(true)).toBe("boolean(true)");
    expect(describeValue("a".repeat(25))).toBe(`string("${"a".repeat(17)}...")`);
  });
});
