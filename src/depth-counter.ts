import { JsonErrc } from './errors.js';
import { err, makeResult, ok, type Result } from './result.js';
import { ContainerType, Expectation } from './types.js';

/**
 * Parse state of one open object or array.
 */
export class ItemStack {
  count = 0;
  /** An element is complete and no `,` has followed it yet */
  separatorPending = false;

  private constructor(
    readonly type: ContainerType,
    public expectation: Expectation,
  ) {}

  static array(): ItemStack {
    return new ItemStack(ContainerType.Array, Expectation.Value);
  }

  static object(): ItemStack {
    return new ItemStack(ContainerType.Object, Expectation.Key);
  }

  expectsKey(): boolean {
    return this.expectation === Expectation.Key;
  }

  expectsValue(): boolean {
    return this.expectation === Expectation.Value;
  }
}

/**
 * Bounded stack of open containers, outermost first. Validates every
 * structural transition before applying it, so a failed step leaves the stack
 * as it was.
 */
export class DepthCounter {
  private readonly items: ItemStack[] = [];
  private topLevelValues = 0;

  constructor(
    readonly maxDepth = 32,
    private readonly singleValue = false,
  ) {}

  get depth(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /** Innermost open container, if any. */
  get active(): ItemStack | undefined {
    return this.items[this.items.length - 1];
  }

  checkEndOfFile(): Result<void> {
    const active = this.active;
    if (active === undefined) return ok();
    return active.type === ContainerType.Array
      ? err(JsonErrc.ExpectedClosingBrackets, 'DepthCounter.checkEndOfFile')
      : err(JsonErrc.ExpectedClosingBraces, 'DepthCounter.checkEndOfFile');
  }

  checkNonEmpty(): Result<void> {
    return makeResult(!this.isEmpty(), JsonErrc.UnexpectedOnTopLevel, 'DepthCounter.checkNonEmpty');
  }

  addArray(): Result<void> {
    return makeResult(this.push(ItemStack.array()), JsonErrc.UnexpectedOpeningBrackets, this.depthMessage());
  }

  addObject(): Result<void> {
    return makeResult(this.push(ItemStack.object()), JsonErrc.UnexpectedOpeningBraces, this.depthMessage());
  }

  /** Closes the innermost object and yields the number of its members. */
  popObject(): Result<number> {
    const active = this.active;
    if (active === undefined) return err(JsonErrc.NotInObject, 'DepthCounter.popObject');
    if (!active.expectsKey()) return err(JsonErrc.ExpectedValue, 'DepthCounter.popObject');
    if (active.type !== ContainerType.Object) return err(JsonErrc.NotInObject, 'DepthCounter.popObject');
    this.items.pop();
    return ok(active.count);
  }

  /** Closes the innermost array and yields the number of its elements. */
  popArray(): Result<number> {
    const active = this.active;
    if (active === undefined || active.type !== ContainerType.Array) {
      return err(JsonErrc.NotInArray, 'DepthCounter.popArray');
    }
    this.items.pop();
    return ok(active.count);
  }

  addKey(): Result<void> {
    const active = this.active;
    if (active === undefined || !active.expectsKey()) return err(JsonErrc.ExpectedValue, 'DepthCounter.addKey');
    if (active.separatorPending) return err(JsonErrc.ExpectedComma, 'DepthCounter.addKey');
    active.expectation = Expectation.Value;
    return ok();
  }

  addValue(): Result<void> {
    const active = this.active;
    if (active === undefined) return this.addTopLevelValue();
    if (active.type === ContainerType.Object) {
      if (!active.expectsValue()) return err(JsonErrc.ExpectedKey, 'DepthCounter.addValue');
      active.expectation = Expectation.Key;
    } else if (active.separatorPending) {
      return err(JsonErrc.ExpectedComma, 'DepthCounter.addValue');
    }
    active.count += 1;
    active.separatorPending = true;
    return ok();
  }

  /** Admits a `,` between two elements of the innermost container. */
  addSeparator(): Result<void> {
    const active = this.active;
    if (active === undefined) return err(JsonErrc.UnexpectedOnTopLevel, 'DepthCounter.addSeparator');
    if (!active.separatorPending) {
      const code = active.type === ContainerType.Object && active.expectsKey() ? JsonErrc.ExpectedKey : JsonErrc.ExpectedValue;
      return err(code, 'DepthCounter.addSeparator');
    }
    active.separatorPending = false;
    return ok();
  }

  private addTopLevelValue(): Result<void> {
    if (this.singleValue && this.topLevelValues > 0) {
      return err(JsonErrc.UnexpectedOnTopLevel, 'Only one value is allowed on the top level');
    }
    this.topLevelValues += 1;
    return ok();
  }

  private push(item: ItemStack): boolean {
    if (this.items.length >= this.maxDepth) return false;
    this.items.push(item);
    return true;
  }

  private depthMessage(): string {
    return `Maximum depth of ${this.maxDepth} exceeded`;
  }
}
