// src/core/eval/env.ts
// Lexical environments: a chain of mutable frames, innermost first.
// Frames are shared by reference between child environments and closures,
// so a mutation made through one alias is seen through all of them.

import type { Value } from "./values";
import { UnboundVariable } from "../errors";

export type Binding = [string, Value];

export class Environment {
  private readonly frame: Map<string, Value>;
  public readonly parent: Environment | undefined;

  constructor(bindings: Iterable<Binding> = [], parent?: Environment) {
    this.frame = new Map(bindings);
    this.parent = parent;
  }

  /** Number of frames in the chain, this one included. */
  get depth(): number {
    let n = 0;
    for (let e: Environment | undefined = this; e; e = e.parent) n++;
    return n;
  }

  lookup(name: string): Value {
    for (let e: Environment | undefined = this; e; e = e.parent) {
      const v = e.frame.get(name);
      if (v !== undefined) return v;
    }
    throw new UnboundVariable(name);
  }

  has(name: string): boolean {
    for (let e: Environment | undefined = this; e; e = e.parent) {
      if (e.frame.has(name)) return true;
    }
    return false;
  }

  /** Bind in this environment's own frame. Never touches outer frames. */
  define(name: string, value: Value): void {
    this.frame.set(name, value);
  }

  /** Overwrite the binding in the nearest frame that already holds `name`. */
  mutate(name: string, value: Value): void {
    for (let e: Environment | undefined = this; e; e = e.parent) {
      if (e.frame.has(name)) {
        e.frame.set(name, value);
        return;
      }
    }
    throw new UnboundVariable(name);
  }

  extend(bindings: Iterable<Binding>): Environment {
    return new Environment(bindings, this);
  }

  /** Names bound in this environment's own frame, in insertion order. */
  ownNames(): string[] {
    return Array.from(this.frame.keys());
  }

  ownEntries(): Binding[] {
    return Array.from(this.frame.entries());
  }
}
