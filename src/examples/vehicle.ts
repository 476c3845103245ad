import { Reflective, Ref, defineType, t, type ReflectiveFacade } from "../reflect";

/**
 * Second demo type: container, char and pointer tags, plus a private field
 * exposed through an accessor pair.
 */
export class Vehicle extends Reflective {
  static readonly type = defineType<Vehicle>("Vehicle", (reg) =>
    reg
      .member("make", t.string, "make")
      .member("model", t.string, "model")
      .member("year", t.int, "year")
      .member("grade", t.char, "grade")
      .member("trips", t.vector(t.double), "trips")
      .member("fuel", t.ptr(t.double), "fuel")
      .accessor("running", t.bool, {
        get: (v) => v.running,
        set: (v, running) => {
          v.running = running;
        },
      })
      .method("start", [], t.void, (v) => v.start())
      .method("stop", [], t.void, (v) => v.stop())
      .method("drive", [t.double], t.double, (v, km) => v.drive(km))
      .method("totalDistance", [], t.double, (v) => v.totalDistance())
      .method("getInfo", [], t.string, (v) => v.getInfo())
  );

  private running = false;
  grade = "B";
  trips: number[] = [];

  constructor(
    public make = "",
    public model = "",
    public year = 2000,
    public fuel: Ref<number> = new Ref(0)
  ) {
    super();
  }

  protected reflection(): ReflectiveFacade {
    return Vehicle.type.bind(this);
  }

  start(): void {
    this.running = true;
  }

  stop(): void {
    this.running = false;
  }

  /** Logs a trip and returns the new total; refuses to move when stopped. */
  drive(km: number): number {
    if (!this.running) {
      throw new Error(`${this.make} ${this.model} is not running`);
    }
    this.trips.push(km);
    this.fuel.value = Math.max(0, this.fuel.value - km / 20);
    return this.totalDistance();
  }

  totalDistance(): number {
    return this.trips.reduce((sum, km) => sum + km, 0);
  }

  getInfo(): string {
    return `${this.year} ${this.make} ${this.model}${this.running ? " (running)" : ""}`;
  }
}
