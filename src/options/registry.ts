import { MutuallyExclusiveError, UnknownOptionError, ValidationError } from "../core/errors.js";
import type { Rule } from "./rules.js";
import type { OptionValue, ValueKind } from "./values.js";

export type Unset = null | undefined | false;

/** Keyword arguments of a batch setter; recognized keys are removed as they are consumed. */
export type OptionContainer = Record<string, unknown>;

function isUnset(value: unknown): value is Unset {
  return value === undefined || value === null || value === false;
}

export class OptionRegistry {
  private options = new Map<string, OptionValue>();

  get size(): number {
    return this.options.size;
  }

  /**
   * Stores a copy of `value` under `name` after running `rules` on it in order,
   * or removes `name` when the value is unset. Returns whether the option is
   * now present. Later changes to the caller's arrays or dates do not reach
   * the stored copy.
   */
  set<T extends OptionValue>(setter: string, name: string, value: T | Unset, rules: ReadonlyArray<Rule<T>> = []): boolean {
    if (isUnset(value)) {
      this.options.delete(name);
      return false;
    }
    const owned = structuredClone(value);
    for (const r of rules) {
      if (!r.check(owned)) throw new ValidationError(setter, `${name}: ${r.message}`, name);
    }
    this.options.set(name, owned);
    return true;
  }

  setFrom<T extends OptionValue>(
    setter: string,
    name: string,
    container: OptionContainer,
    key: string,
    kind: ValueKind<T>,
    rules: ReadonlyArray<Rule<T>> = []
  ): boolean {
    if (!Object.prototype.hasOwnProperty.call(container, key)) return false;
    const raw = container[key];
    delete container[key];
    if (isUnset(raw)) return this.set<T>(setter, name, null);
    if (!kind.is(raw)) throw new ValidationError(setter, `${key} must be ${kind.expected}`, name);
    return this.set(setter, name, raw, rules);
  }

  get(name: string): OptionValue | undefined {
    return this.options.get(name);
  }

  has(name: string): boolean {
    return this.options.has(name);
  }

  delete(name: string): boolean {
    return this.options.delete(name);
  }

  entries(): IterableIterator<[string, OptionValue]> {
    return this.options.entries();
  }

  snapshot(): Array<[string, OptionValue]> {
    return [...this.options.entries()];
  }

  /** Runs a batch of updates; if it throws, the previous contents and order are restored. */
  transaction<R>(fn: () => R): R {
    const saved = new Map(this.options);
    try {
      return fn();
    } catch (e) {
      this.options = saved;
      throw e;
    }
  }

  forSetter(setter: string): ScopedOptions {
    return new ScopedOptions(this, setter);
  }
}

/** Registry view bound to one setter name, used for error attribution. */
export class ScopedOptions {
  constructor(
    private readonly registry: OptionRegistry,
    readonly setter: string
  ) {}

  set<T extends OptionValue>(name: string, value: T | Unset, rules: ReadonlyArray<Rule<T>> = []): boolean {
    return this.registry.set(this.setter, name, value, rules);
  }

  setFrom<T extends OptionValue>(
    name: string,
    container: OptionContainer,
    key: string,
    kind: ValueKind<T>,
    rules: ReadonlyArray<Rule<T>> = []
  ): boolean {
    return this.registry.setFrom(this.setter, name, container, key, kind, rules);
  }

  /**
   * Removes `key` from the container and checks its shape without storing it.
   * `undefined` means the key was not given, `null` that it asks for removal.
   */
  take<T>(container: OptionContainer, key: string, kind: ValueKind<T>): T | null | undefined {
    if (!Object.prototype.hasOwnProperty.call(container, key)) return undefined;
    const raw = container[key];
    delete container[key];
    if (isUnset(raw)) return null;
    if (!kind.is(raw)) throw new ValidationError(this.setter, `${key} must be ${kind.expected}`, key);
    return raw;
  }

  get(name: string): OptionValue | undefined {
    return this.registry.get(name);
  }

  has(name: string): boolean {
    return this.registry.has(name);
  }

  assertExclusive(a: string, b: string): void {
    if (this.registry.has(a) && this.registry.has(b)) throw new MutuallyExclusiveError(this.setter, a, b);
  }

  assertNoUnknown(container: OptionContainer): void {
    const leftover = Object.keys(container);
    if (leftover.length > 0) throw new UnknownOptionError(this.setter, leftover);
  }
}
