#!/usr/bin/env npx tsx
// bin/reflect-demo.ts
// Walks the reflective facade over the demo types
//
// Run:  npx tsx bin/reflect-demo.ts [--json] [--docs]

import { Boxed, box, defaultRegistry, generateMarkdown, isReflectionError, t, unbox, validateRegistry } from "../src/reflect";
import { Person, Vehicle } from "../src/examples";
import { createHostObject, toSnakeCase } from "../src/bindings";
import { loadConfig, validateConfig } from "../src/config";

// ═══════════════════════════════════════════════════════════════════════════════
// SECTIONS
// ═══════════════════════════════════════════════════════════════════════════════

function section(title: string): void {
  console.log(`\n=== ${title} ===`);
}

function basicUsage(person: Person): void {
  section("Class info");
  console.log(person.describe());

  section("Member access");
  for (const name of person.getMemberNames()) {
    console.log(person.formatMemberValue(name));
  }

  person.setMemberValue("age", box(t.int, 26));
  person.setMemberValue("name", box(t.string, "Alice Smith"));
  console.log(`after update: ${person.formatMemberValue("name")}, ${person.formatMemberValue("age")}`);
}

function methodCalls(person: Person): void {
  section("Method calls");
  person.callMethod("introduce");
  person.callMethod("celebrateBirthday");
  person.callMethod("grow", [box(t.double, 5.0)]);
  person.callMethod("setNameAndAge", [box(t.string, "Bob"), box(t.int, 30)]);
  person.callMethod("setNameAgeAndHeight", [box(t.string, "Charlie"), box(t.int, 35), box(t.double, 1.80)]);

  const description = unbox(t.string, person.callMethod("getDescription"));
  console.log(`getDescription -> ${description}`);
}

function errorHandling(person: Person): void {
  section("Errors");
  const attempts: Array<[string, () => unknown]> = [
    ["unknown member", () => person.getMemberValue("weight")],
    ["unknown method", () => person.callMethod("fly")],
    ["wrong arity", () => person.callMethod("setAge", [])],
    ["wrong type", () => person.setMemberValue("age", box(t.string, "old"))],
  ];
  for (const [label, attempt] of attempts) {
    try {
      attempt();
      console.log(`${label}: no error`);
    } catch (e) {
      if (!isReflectionError(e)) throw e;
      console.log(`${label}: [${e.code}] ${e.message}`);
    }
  }
}

function containers(): void {
  section("Containers and pointers");
  const car = new Vehicle("Toyota", "Corolla", 2020);
  car.fuel.value = 40;
  car.callMethod("start");
  car.callMethod("drive", [box(t.double, 12.5)]);
  const total = car.callMethod("drive", [box(t.double, 30)]);
  console.log(`total distance: ${total.as(t.double)}`);
  console.log(`trips: ${car.getMemberValue("trips").as(t.vector(t.double)).join(", ")}`);
  console.log(car.formatMemberValue("fuel"));
  console.log(`info: ${unbox(t.string, car.callMethod("getInfo"))}`);
}

function bindings(): void {
  section("Host object");
  const host = createHostObject(new Person("Dana", 41, 1.7, () => undefined), {
    suppressAccessors: true,
    rename: toSnakeCase,
  });
  console.log(`members: ${JSON.stringify(host.__members())}`);
  console.log(`methods: ${JSON.stringify(host.__methods())}`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

function main(): void {
  const args = process.argv.slice(2);
  const config = loadConfig();
  const check = validateConfig(config);
  for (const warning of check.warnings) console.warn(`config: ${warning}`);

  const person = new Person("Alice", 25, 1.65);

  if (args.includes("--json")) {
    console.log(JSON.stringify(person.toJSON(), null, config.export.indent));
    return;
  }
  if (args.includes("--docs")) {
    console.log(generateMarkdown(defaultRegistry));
    return;
  }

  basicUsage(person);
  methodCalls(person);
  errorHandling(person);
  containers();
  bindings();

  section("Registry");
  const result = validateRegistry(defaultRegistry);
  console.log(`types: ${defaultRegistry.names().join(", ")} (valid: ${result.valid})`);
  console.log(`empty box: ${Boxed.empty.toString()}`);
}

main();
