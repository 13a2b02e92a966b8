/**
 * Lexical scopes. Each block and each call gets a child of the scope it
 * closes over; closures keep their defining scope alive by reference.
 */
import type { RoadmanValue } from "./values.js";

interface Binding {
  value: RoadmanValue;
  constant: boolean;
}

export type AssignOutcome = "assigned" | "undefined" | "constant";

export class Environment {
  private bindings = new Map<string, Binding>();
  readonly parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.parent = parent;
  }

  child(): Environment {
    return new Environment(this);
  }

  /** Binds in this scope, replacing any earlier binding of the same name here. */
  define(name: string, value: RoadmanValue, constant: boolean = false): void {
    this.bindings.set(name, { value, constant });
  }

  private lookup(name: string): Binding | undefined {
    const own = this.bindings.get(name);
    if (own !== undefined) return own;
    return this.parent ? this.parent.lookup(name) : undefined;
  }

  /** Undefined when no enclosing scope binds `name`; absence is `null`. */
  get(name: string): RoadmanValue | undefined {
    return this.lookup(name)?.value;
  }

  /** Rebinds the nearest existing binding of `name`. */
  assign(name: string, value: RoadmanValue): AssignOutcome {
    const binding = this.lookup(name);
    if (!binding) return "undefined";
    if (binding.constant) return "constant";
    binding.value = value;
    return "assigned";
  }
}
