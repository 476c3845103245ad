import { Reflective, defineType, t, type ReflectiveFacade } from "../reflect";

export type Say = (line: string) => void;

const consoleSay: Say = (line) => console.log(line);

export class Person extends Reflective {
  static readonly type = defineType<Person>("Person", (reg) =>
    reg
      .member("name", t.string, "name")
      .member("age", t.int, "age")
      .member("height", t.double, "height")
      .member("isActive", t.bool, "isActive")
      .method("introduce", [], t.void, (p) => p.introduce())
      .method("celebrateBirthday", [], t.void, (p) => p.celebrateBirthday())
      .method("grow", [t.double], t.void, (p, cm) => p.grow(cm))
      .method("toggleActive", [], t.void, (p) => p.toggleActive())
      .method("getName", [], t.string, (p) => p.getName())
      .method("setName", [t.string], t.void, (p, name) => p.setName(name))
      .method("getAge", [], t.int, (p) => p.getAge())
      .method("setAge", [t.int], t.void, (p, age) => p.setAge(age))
      .method("getHeight", [], t.double, (p) => p.getHeight())
      .method("setHeight", [t.double], t.void, (p, height) => p.setHeight(height))
      .method("setNameAndAge", [t.string, t.int], t.void, (p, name, age) => p.setNameAndAge(name, age))
      .method("setNameAgeAndHeight", [t.string, t.int, t.double], t.void, (p, name, age, height) =>
        p.setNameAgeAndHeight(name, age, height)
      )
      .method("getDescription", [], t.string, (p) => p.getDescription())
  );

  name: string;
  age: number;
  height: number;
  isActive = true;

  constructor(name = "", age = 0, height = 0.0, private readonly say: Say = consoleSay) {
    super();
    this.name = name;
    this.age = age;
    this.height = height;
  }

  protected reflection(): ReflectiveFacade {
    return Person.type.bind(this);
  }

  introduce(): void {
    this.say(`Hello, I'm ${this.name}, ${this.age} years old, ${this.height}m tall.`);
  }

  celebrateBirthday(): void {
    this.age++;
    this.say(`${this.name} is now ${this.age} years old!`);
  }

  grow(cm: number): void {
    this.height += cm / 100;
  }

  toggleActive(): void {
    this.isActive = !this.isActive;
  }

  getName(): string {
    return this.name;
  }

  setName(name: string): void {
    this.name = name;
  }

  getAge(): number {
    return this.age;
  }

  setAge(age: number): void {
    this.age = age;
  }

  getHeight(): number {
    return this.height;
  }

  setHeight(height: number): void {
    this.height = height;
  }

  setNameAndAge(name: string, age: number): void {
    this.setName(name);
    this.setAge(age);
  }

  setNameAgeAndHeight(name: string, age: number, height: number): void {
    this.setNameAndAge(name, age);
    this.setHeight(height);
  }

  getDescription(): string {
    return `${this.name} (${this.age} years, ${this.height.toFixed(2)}m)`;
  }
}
