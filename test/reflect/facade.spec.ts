import { describe, it, expect, beforeEach } from "vitest";
import { ArityMismatch, NotFound, Ref, TypeMismatch, box, t, unbox } from "../../src/reflect";
import { Person, Vehicle } from "../../src/examples";

describe("Person facade", () => {
  let lines: string[];
  let alice: Person;

  beforeEach(() => {
    lines = [];
    alice = new Person("Alice", 25, 1.65, (line) => lines.push(line));
  });

  describe("Happy Path", () => {
    it("sets and reads a member through boxes", () => {
      const p = new Person();
      p.setMemberValue("age", box(t.int, 25));
      expect(unbox(t.int, p.getMemberValue("age"))).toBe(25);
      expect(p.age).toBe(25);
    });

    it("calls a two-parameter method", () => {
      const result = alice.callMethod("setNameAndAge", [box(t.string, "Toto"), box(t.int, 22)]);

      expect(result.isEmpty()).toBe(true);
      expect(unbox(t.string, alice.getMemberValue("name"))).toBe("Toto");
      expect(unbox(t.int, alice.getMemberValue("age"))).toBe(22);
    });

    it("calls a three-parameter method", () => {
      alice.callMethod("setNameAgeAndHeight", [box(t.string, "Charlie"), box(t.int, 35), box(t.double, 1.8)]);
      expect(alice.toJSON()).toEqual({ name: "Charlie", age: 35, height: 1.8, isActive: true });
    });

    it("returns boxed results", () => {
      expect(unbox(t.string, alice.callMethod("getDescription"))).toBe("Alice (25 years, 1.65m)");
      expect(unbox(t.int, alice.callMethod("getAge"))).toBe(25);
      expect(alice.callMethod("getHeight").tag).toBe("double");
    });

    it("runs methods with side effects", () => {
      alice.callMethod("introduce");
      alice.callMethod("celebrateBirthday");
      alice.callMethod("grow", [box(t.double, 5)]);
      alice.callMethod("toggleActive");

      expect(lines).toEqual(["Hello, I'm Alice, 25 years old, 1.65m tall.", "Alice is now 26 years old!"]);
      expect(alice.age).toBe(26);
      expect(alice.height).toBeCloseTo(1.7);
      expect(alice.isActive).toBe(false);
    });

    it("lists names in registration order", () => {
      expect(alice.getMemberNames()).toEqual(["name", "age", "height", "isActive"]);
      expect(alice.getMethodNames().slice(0, 4)).toEqual(["introduce", "celebrateBirthday", "grow", "toggleActive"]);
      expect(alice.getMethodNames()).toHaveLength(13);
      expect(alice.getClassName()).toBe("Person");
    });

    it("formats member values with their tags", () => {
      expect(alice.formatMemberValue("name")).toBe("name (string): Alice");
      expect(alice.formatMemberValue("age")).toBe("age (int): 25");
      expect(alice.formatMemberValue("height")).toBe("height (double): 1.65");
      expect(alice.formatMemberValue("isActive")).toBe("isActive (bool): true");
    });

    it("shares one descriptor between instances while values stay separate", () => {
      const bob = new Person("Bob", 40, 1.8);

      expect(alice.getTypeInfo()).toBe(bob.getTypeInfo());
      alice.setMemberValue("age", box(t.int, 99));
      expect(unbox(t.int, bob.getMemberValue("age"))).toBe(40);
    });
  });

  describe("Edge Cases", () => {
    it("rejects wrong arity without touching the instance", () => {
      const call = () => alice.callMethod("introduce", [box(t.int, 1), box(t.int, 2), box(t.int, 3)]);

      expect(call).toThrow(ArityMismatch);
      expect(call).toThrow("ArityMismatch: method 'introduce' expects 0 argument(s), got 3");
      expect(lines).toEqual([]);
      expect(alice.toJSON()).toEqual({ name: "Alice", age: 25, height: 1.65, isActive: true });
    });

    it("rejects a mistyped argument before calling", () => {
      expect(() => alice.callMethod("setNameAndAge", [box(t.string, "Bob"), box(t.string, "x")])).toThrow(
        "TypeMismatch: expected int, got string (Person.setNameAndAge argument 2)"
      );
      expect(alice.name).toBe("Alice");
    });

    it("rejects a mistyped member write", () => {
      expect(() => alice.setMemberValue("age", box(t.double, 30.5))).toThrow(
        "TypeMismatch: expected int, got double (Person.age)"
      );
      expect(alice.age).toBe(25);
    });

    it("fails on unregistered names while the predicates stay quiet", () => {
      expect(() => alice.getMemberValue("weight")).toThrow(NotFound);
      expect(() => alice.getMemberValue("weight")).toThrow("NotFound: member 'weight' on Person");
      expect(() => alice.setMemberValue("weight", box(t.double, 70))).toThrow(NotFound);
      expect(() => alice.callMethod("fly")).toThrow("NotFound: method 'fly' on Person");
      expect(alice.hasMember("weight")).toBe(false);
      expect(alice.hasMethod("fly")).toBe(false);
      expect(alice.hasMember("age")).toBe(true);
    });

    it("fails when a member holds a value outside its tag", () => {
      alice.age = 1.5;
      expect(() => alice.getMemberValue("age")).toThrow(TypeMismatch);
    });
  });
});

describe("Vehicle facade", () => {
  let car: Vehicle;

  beforeEach(() => {
    car = new Vehicle("Toyota", "Corolla", 2020, new Ref(40));
  });

  describe("Happy Path", () => {
    it("reads an accessor-backed member", () => {
      expect(unbox(t.bool, car.getMemberValue("running"))).toBe(false);
      car.callMethod("start");
      expect(unbox(t.bool, car.getMemberValue("running"))).toBe(true);
      expect(unbox(t.string, car.callMethod("getInfo"))).toBe("2020 Toyota Corolla (running)");
    });

    it("writes through an accessor", () => {
      car.setMemberValue("running", box(t.bool, true));
      expect(unbox(t.string, car.callMethod("getInfo"))).toBe("2020 Toyota Corolla (running)");
    });

    it("carries vectors and pointers", () => {
      car.callMethod("start");
      const total = car.callMethod("drive", [box(t.double, 20)]);

      expect(total.as(t.double)).toBe(20);
      expect(car.getMemberValue("trips").as(t.vector(t.double))).toEqual([20]);
      expect(car.getMemberValue("fuel").as(t.ptr(t.double))).toBe(car.fuel);
      expect(car.fuel.value).toBe(39);
    });

    it("replaces a vector member", () => {
      car.setMemberValue("trips", box(t.vector(t.double), [1.5, 2.5]));
      expect(unbox(t.double, car.callMethod("totalDistance"))).toBe(4);
    });

    it("exports non-scalar members as null", () => {
      expect(car.toJSON()).toEqual({
        make: "Toyota",
        model: "Corolla",
        year: 2020,
        grade: "B",
        trips: null,
        fuel: null,
        running: false,
      });
      expect(car.formatMemberValue("trips")).toBe("trips (vector<double>): [vector<double> value]");
      expect(car.formatMemberValue("grade")).toBe("grade (char): B");
    });
  });

  describe("Edge Cases", () => {
    it("propagates errors thrown by the method itself", () => {
      expect(() => car.callMethod("drive", [box(t.double, 5)])).toThrow("Toyota Corolla is not running");
      expect(car.trips).toEqual([]);
    });

    it("rejects a multi-character char", () => {
      expect(() => car.setMemberValue("grade", box(t.string, "AB"))).toThrow(TypeMismatch);
      car.setMemberValue("grade", box(t.char, "A"));
      expect(car.grade).toBe("A");
    });
  });
});
