/**
 * Expression IR
 *
 * Every operation is an immutable `Expr` node with an ordered operand list.
 * A node's `name` is a content hash of its kind and operands, so two nodes
 * built from the same inputs are interchangeable, and rewrites detect a
 * fixed point by comparing names.
 *
 * @example
 * ```typescript
 * const df = new FromFrame(frame, kw({ npartitions: 4 }));
 * const expr = df.getItem('x').add(df.getItem('y')).sub(1);
 * expr.meta;         // zero-row Series, computed from the children's meta
 * expr.divisions;    // inherited from df
 * ```
 */

import { ExpressionError, PlanError, ValidationError, tokenize, type Tokenizable } from '@framegraph/core';
import {
  DataFrame,
  Series,
  applyValues,
  assign,
  astype,
  binaryOp,
  compareScalars,
  describeValue,
  emptyLike,
  expectValue,
  filterRows,
  getItem,
  head,
  indexOf,
  isColumnKey,
  isDType,
  isScalar,
  ndimOf,
  OPERATOR_SYMBOLS,
  type ApplyFunction,
  type BinaryOperator,
  type ColumnKey,
  type DType,
  type DTypeSpec,
  type Scalar,
  type Value,
} from '@framegraph/frame';
import { aliasTask, ref, taskKey } from './graph.js';
import { areDivisionsKnown, unknownDivisions, type Divisions, type Task, type TaskGraph } from './types.js';

// =============================================================================
// Construction Helpers
// =============================================================================

/**
 * Named operands passed as the last constructor argument.
 */
export class Keywords {
  constructor(readonly values: Readonly<Record<string, unknown>>) {}
}

/**
 * Wrap named operands for an expression constructor.
 *
 * @example
 * ```typescript
 * new Head(df, kw({ n: 10 }));
 * ```
 */
export function kw(values: Readonly<Record<string, unknown>>): Keywords {
  return new Keywords(values);
}

export function isExpr(value: unknown): value is Expr {
  return value instanceof Expr;
}

/**
 * Settings that lowering needs from the configuration.
 */
export interface LowerOptions {
  /** Fan-in of tree reductions when a node leaves it unset; null means one level */
  splitEvery: number | null;
}

function formatOperand(value: unknown): string {
  if (value instanceof Expr) return value.name;
  if (value instanceof DataFrame || value instanceof Series) return value.toString();
  if (typeof value === 'function') return value.name || 'function';
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return `[${value.map(formatOperand).join(', ')}]`;
  if (typeof value === 'object' && value !== null && !isPlainObject(value)) return String(value);
  return JSON.stringify(value);
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Partition boundaries of the selected `partitions` of `divisions`. Known only
 * when the selection is strictly increasing.
 */
export function selectDivisions(divisions: Divisions, partitions: readonly number[]): Scalar[] {
  const npartitions = divisions.length - 1;
  for (const index of partitions) {
    if (!Number.isInteger(index) || index < 0 || index >= npartitions) {
      throw ValidationError.invalidPartition(index, npartitions);
    }
  }
  const increasing = partitions.every((p, i) => i === 0 || p > partitions[i - 1]);
  if (!increasing || partitions.length === 0) {
    return unknownDivisions(partitions.length);
  }
  return [...partitions.map((p) => divisions[p]), divisions[partitions[partitions.length - 1] + 1]];
}

// =============================================================================
// Expr
// =============================================================================

const ATTRIBUTES: Readonly<Record<string, (expr: Expr) => unknown>> = {
  name: (e) => e.name,
  meta: (e) => e.meta,
  divisions: (e) => e.divisions,
  npartitions: (e) => e.npartitions,
  knownDivisions: (e) => e.knownDivisions,
  ndim: (e) => e.ndim,
  columns: (e) => e.columns,
  dtypes: (e) => e.dtypes,
};

/**
 * Base expression node.
 *
 * Subclasses declare `parameters` (operand names in order), `defaults` for
 * trailing operands, and override the hooks they need: `computeMeta`,
 * `computeDivisions`, `simplify`, `simplifyUp`, `lower` and `task` or
 * `layer`. Rewrite hooks return `undefined` to decline.
 */
export class Expr implements Tokenizable {
  static parameters: readonly string[] = [];
  static defaults: Readonly<Record<string, unknown>> = {};
  /** Keep positional operands past the declared parameters */
  static variadic = false;

  readonly kind: typeof Expr;
  readonly operands: readonly unknown[];
  private nameCache: string | undefined;
  private metaBox: { value: Value } | undefined;
  private divisionsCache: Divisions | undefined;

  constructor(...args: unknown[]) {
    this.kind = new.target;
    const { parameters, defaults, variadic } = new.target;
    const kind = new.target.name;
    const last = args[args.length - 1];
    const keywords = last instanceof Keywords ? last.values : {};
    const positional = last instanceof Keywords ? args.slice(0, -1) : args;

    if (!variadic && positional.length > parameters.length) {
      throw ExpressionError.tooManyOperands(kind, parameters.length, positional.length);
    }
    for (const key of Object.keys(keywords)) {
      const at = parameters.indexOf(key);
      if (at < 0) {
        throw ExpressionError.unknownParameter(kind, key, parameters);
      }
      if (at < positional.length) {
        throw ExpressionError.duplicateOperand(kind, key);
      }
    }
    const named = parameters.map((parameter, i) => {
      if (i < positional.length) return positional[i];
      if (Object.hasOwn(keywords, parameter)) return keywords[parameter];
      if (Object.hasOwn(defaults, parameter)) return defaults[parameter];
      throw ExpressionError.missingOperand(kind, parameter);
    });
    this.operands = Object.freeze([...named, ...positional.slice(parameters.length)]);
  }

  // ---------------------------------------------------------------------------
  // Identity
  // ---------------------------------------------------------------------------

  get label(): string {
    return this.kind.name.toLowerCase();
  }

  /**
   * Content-addressed name: `<label>-<hash of label and operands>`.
   */
  get name(): string {
    if (this.nameCache === undefined) {
      this.nameCache = `${this.label}-${tokenize(this.label, ...this.operands)}`;
    }
    return this.nameCache;
  }

  toToken(): string {
    return this.name;
  }

  /**
   * Operand by parameter name. Unlike `get`, never resolves to an attribute.
   */
  operand(parameter: string): unknown {
    const at = this.kind.parameters.indexOf(parameter);
    if (at < 0) {
      throw ExpressionError.unknownParameter(this.kind.name, parameter, this.kind.parameters);
    }
    return this.operands[at];
  }

  /**
   * Two-tier lookup: declared attributes first, then operands by name.
   */
  get(key: string): unknown {
    const attribute = ATTRIBUTES[key];
    if (attribute !== undefined && Object.hasOwn(ATTRIBUTES, key)) {
      return attribute(this);
    }
    if (this.kind.parameters.includes(key)) {
      return this.operand(key);
    }
    throw ExpressionError.unknownAttribute(this.kind.name, key);
  }

  protected exprOperand(parameter: string): Expr {
    const value = this.operand(parameter);
    if (value instanceof Expr) return value;
    throw ValidationError.typeMismatch(`${this.kind.name}.${parameter}`, 'an expression', describeValue(value));
  }

  protected numberOperand(parameter: string): number {
    const value = this.operand(parameter);
    if (typeof value === 'number') return value;
    throw ValidationError.typeMismatch(`${this.kind.name}.${parameter}`, 'a number', describeValue(value));
  }

  protected stringOperand(parameter: string): string {
    const value = this.operand(parameter);
    if (typeof value === 'string') return value;
    throw ValidationError.typeMismatch(`${this.kind.name}.${parameter}`, 'a string', describeValue(value));
  }

  protected booleanOperand(parameter: string): boolean {
    const value = this.operand(parameter);
    if (typeof value === 'boolean') return value;
    throw ValidationError.typeMismatch(`${this.kind.name}.${parameter}`, 'a boolean', describeValue(value));
  }

  protected stringListOperand(parameter: string): string[] | null {
    const value = this.operand(parameter);
    if (value === null || value === undefined) return null;
    if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) return [...value];
    throw ValidationError.typeMismatch(`${this.kind.name}.${parameter}`, 'a list of strings', describeValue(value));
  }

  /** Operands past the declared parameters. */
  protected get rest(): readonly unknown[] {
    return this.operands.slice(this.kind.parameters.length);
  }

  /**
   * Child nodes, in operand order: the edges of the expression graph.
   */
  dependencies(): Expr[] {
    return this.operands.filter(isExpr);
  }

  // ---------------------------------------------------------------------------
  // Metadata & Partitions
  // ---------------------------------------------------------------------------

  /**
   * Zero-row schema of the result, computed once from the children's meta.
   */
  get meta(): Value {
    if (this.metaBox === undefined) {
      this.metaBox = { value: this.computeMeta() };
    }
    return this.metaBox.value;
  }

  /**
   * Partition boundaries, computed once. Known boundaries are checked to be
   * non-decreasing.
   */
  get divisions(): Divisions {
    if (this.divisionsCache === undefined) {
      const divisions = Object.freeze([...this.computeDivisions()]);
      if (areDivisionsKnown(divisions)) {
        for (let i = 1; i < divisions.length; i++) {
          if (compareScalars(divisions[i - 1], divisions[i]) > 0) {
            throw ValidationError.invalidDivisions(divisions);
          }
        }
      }
      this.divisionsCache = divisions;
    }
    return this.divisionsCache;
  }

  get npartitions(): number {
    return this.divisions.length - 1;
  }

  get knownDivisions(): boolean {
    return areDivisionsKnown(this.divisions);
  }

  get ndim(): 0 | 1 | 2 {
    return ndimOf(this.meta);
  }

  get columns(): string[] {
    const meta = this.meta;
    if (meta instanceof DataFrame) return [...meta.columns];
    if (meta instanceof Series) return meta.name === null ? [] : [meta.name];
    return [];
  }

  get dtypes(): Record<string, DType> {
    const meta = this.meta;
    if (meta instanceof DataFrame) return meta.dtypes();
    if (meta instanceof Series) return { [meta.name ?? '']: meta.dtype };
    return {};
  }

  protected computeMeta(): Value {
    throw PlanError.notImplemented(this.kind.name, 'meta');
  }

  protected computeDivisions(): Divisions {
    const [first] = this.dependencies();
    return first === undefined ? unknownDivisions(1) : first.divisions;
  }

  // ---------------------------------------------------------------------------
  // Rewriting
  // ---------------------------------------------------------------------------

  /**
   * Local rewrite in terms of this node's own operands.
   */
  simplify(): Expr | undefined {
    return undefined;
  }

  /**
   * Rewrite of `parent`, one of this node's consumers, using knowledge of
   * this node.
   */
  simplifyUp(_parent: Expr): Expr | undefined {
    return undefined;
  }

  /**
   * Expansion into lower-level nodes before materialization.
   */
  lower(_options: LowerOptions): Expr | undefined {
    return undefined;
  }

  /**
   * Copy with new operands; returns this node when nothing changed.
   */
  withOperands(operands: readonly unknown[]): Expr {
    if (operands.length === this.operands.length && operands.every((op, i) => op === this.operands[i])) {
      return this;
    }
    return new this.kind(...operands);
  }

  /**
   * Copy with some named operands replaced.
   */
  substituteParameters(changes: Readonly<Record<string, unknown>>): Expr {
    const operands = [...this.operands];
    for (const [key, value] of Object.entries(changes)) {
      const at = this.kind.parameters.indexOf(key);
      if (at < 0) {
        throw ExpressionError.unknownParameter(this.kind.name, key, this.kind.parameters);
      }
      operands[at] = value;
    }
    return this.withOperands(operands);
  }

  /**
   * Replace nodes anywhere in the tree, matched by name.
   */
  substitute(replacements: ReadonlyMap<string, Expr>): Expr {
    const memo = new Map<string, Expr>();
    const visit = (expr: Expr): Expr => {
      const replacement = replacements.get(expr.name);
      if (replacement !== undefined) return replacement;
      const cached = memo.get(expr.name);
      if (cached !== undefined) return cached;
      const result = expr.withOperands(expr.operands.map((op) => (op instanceof Expr ? visit(op) : op)));
      memo.set(expr.name, result);
      return result;
    };
    return visit(this);
  }

  /**
   * Nodes under `root` of the same kind whose operands equal this node's,
   * ignoring the named parameters.
   */
  findSimilarOperations(root: Expr, ignore: readonly string[]): Expr[] {
    const key = (expr: Expr): string =>
      tokenize(
        expr.label,
        expr.operands.filter((_, i) => !ignore.includes(expr.kind.parameters[i] ?? ''))
      );
    const target = key(this);
    const similar: Expr[] = [];
    for (const node of root.walk()) {
      if (node.kind === this.kind && node.name !== this.name && key(node) === target) {
        similar.push(node);
      }
    }
    return similar;
  }

  /**
   * Every distinct node of the tree, parents before children.
   */
  *walk(): Generator<Expr> {
    const seen = new Set<string>();
    const stack: Expr[] = [this];
    while (stack.length > 0) {
      const node = stack.pop();
      if (node === undefined || seen.has(node.name)) continue;
      seen.add(node.name);
      yield node;
      stack.push(...node.dependencies().reverse());
    }
  }

  /**
   * Nodes of the tree that are instances of `type`.
   */
  findOperations<T extends Expr>(type: abstract new (...args: never[]) => T): T[] {
    const found: T[] = [];
    for (const node of this.walk()) {
      if (node instanceof type) found.push(node);
    }
    return found;
  }

  // ---------------------------------------------------------------------------
  // Materialization
  // ---------------------------------------------------------------------------

  /** Whether the per-partition task is a pure function of the same partition of its inputs. */
  get isFusable(): boolean {
    return false;
  }

  /**
   * Task producing partition `index`.
   */
  task(_index: number): Task {
    throw PlanError.notImplemented(this.kind.name, 'task');
  }

  /**
   * Tasks of this node, keyed by `(name, index)`.
   */
  layer(): TaskGraph {
    const layer: TaskGraph = new Map();
    for (let i = 0; i < this.npartitions; i++) {
      layer.set(taskKey(this.name, i), this.task(i));
    }
    return layer;
  }

  // ---------------------------------------------------------------------------
  // Builder API
  // ---------------------------------------------------------------------------

  add(other: unknown): Expr {
    return new Add(this, other);
  }

  sub(other: unknown): Expr {
    return new Sub(this, other);
  }

  mul(other: unknown): Expr {
    return new Mul(this, other);
  }

  div(other: unknown): Expr {
    return new Div(this, other);
  }

  lt(other: unknown): Expr {
    return new LT(this, other);
  }

  le(other: unknown): Expr {
    return new LE(this, other);
  }

  gt(other: unknown): Expr {
    return new GT(this, other);
  }

  ge(other: unknown): Expr {
    return new GE(this, other);
  }

  eq(other: unknown): Expr {
    return new EQ(this, other);
  }

  ne(other: unknown): Expr {
    return new NE(this, other);
  }

  /**
   * `expr[key]`: a boolean expression filters rows, anything else selects
   * columns.
   */
  getItem(key: Expr | ColumnKey): Expr {
    return key instanceof Expr ? new Filter(this, key) : new Projection(this, key);
  }

  assign(key: string, value: unknown): Expr {
    return new Assign(this, key, value);
  }

  astype(dtypes: DTypeSpec): Expr {
    return new AsType(this, dtypes);
  }

  apply(fn: ApplyFunction, options: { args?: readonly unknown[]; kwargs?: Readonly<Record<string, unknown>>; dtype?: DType } = {}): Expr {
    return new Apply(this, fn, options.args ?? [], options.kwargs ?? {}, options.dtype ?? null);
  }

  head(n = 5): Expr {
    return new Head(this, n);
  }

  projectIndex(): Expr {
    return new ProjectIndex(this);
  }

  partitions(indices: readonly number[]): Expr {
    return new Partitions(this, [...indices]);
  }

  // ---------------------------------------------------------------------------
  // Display
  // ---------------------------------------------------------------------------

  toString(): string {
    return `${this.kind.name}(${this.operands.map(formatOperand).join(', ')})`;
  }

  /**
   * Indented tree of the expression, one node per line.
   */
  explain(): string {
    const lines: string[] = [];
    const visit = (expr: Expr, depth: number): void => {
      const params = expr.operands
        .map((op, i) => (op instanceof Expr ? undefined : `${expr.kind.parameters[i] ?? `_${i}`}=${formatOperand(op)}`))
        .filter((p): p is string => p !== undefined);
      lines.push(`${'  '.repeat(depth)}${expr.kind.name}${params.length > 0 ? `: ${params.join(' ')}` : ''}`);
      for (const dep of expr.dependencies()) visit(dep, depth + 1);
    };
    visit(this, 0);
    return lines.join('\n');
  }
}

// =============================================================================
// Literal
// =============================================================================

/**
 * A constant value as a single-partition node.
 */
export class Literal extends Expr {
  static parameters = ['value'];

  get value(): unknown {
    return this.operand('value');
  }

  protected computeMeta(): Value {
    const value = expectValue(this.value, 'Literal');
    return isScalar(value) ? value : emptyLike(value);
  }

  protected computeDivisions(): Divisions {
    return unknownDivisions(1);
  }

  task(_index: number): Task {
    return { fn: (args) => args[0], args: [this.value] };
  }
}

// =============================================================================
// Blockwise
// =============================================================================

/**
 * A node whose partition `i` depends only on partition `i` of each
 * partitioned dependency. Single-partition dependencies of a multi-partition
 * node, and scalar ones, are broadcast to every partition.
 */
export class Blockwise extends Expr {
  get isFusable(): boolean {
    return true;
  }

  /**
   * Per-partition function; receives every operand, with dependencies
   * replaced by their partition value.
   */
  protected operation(_args: readonly unknown[], _kwargs: Readonly<Record<string, unknown>>): unknown {
    throw PlanError.notImplemented(this.kind.name, 'operation');
  }

  /** Keyword arguments passed to every task. */
  protected taskKwargs(): Readonly<Record<string, unknown>> {
    return {};
  }

  /**
   * Whether `dep` feeds the same value to every output partition.
   */
  isBroadcast(dep: Expr): boolean {
    if (dep.ndim === 0) return true;
    const widest = Math.max(...this.dependencies().map((d) => d.npartitions));
    return dep.npartitions === 1 && widest > 1;
  }

  protected computeMeta(): Value {
    const args = this.operands.map((op) => (op instanceof Expr ? op.meta : op));
    return expectValue(this.operation(args, this.taskKwargs()), this.kind.name);
  }

  /**
   * Divisions shared by all partitioned dependencies.
   *
   * @throws PlanError when they disagree
   */
  protected computeDivisions(): Divisions {
    const partitioned = this.dependencies().filter((dep) => !this.isBroadcast(dep));
    const [first, ...others] = partitioned;
    if (first === undefined) return unknownDivisions(1);
    for (const other of others) {
      const same =
        other.divisions.length === first.divisions.length &&
        other.divisions.every((d, i) => d === first.divisions[i]);
      if (!same) {
        throw PlanError.divisionsMismatch(this.kind.name, partitioned.map((dep) => dep.name));
      }
    }
    return first.divisions;
  }

  task(index: number): Task {
    return {
      fn: (args, kwargs) => this.operation(args, kwargs),
      args: this.operands.map((op) => (op instanceof Expr ? ref(op.name, this.isBroadcast(op) ? 0 : index) : op)),
      kwargs: this.taskKwargs(),
    };
  }
}

/**
 * True when a single-partition frame or series is broadcast against wider
 * ones. Row selections cannot be pushed into such a node's inputs.
 */
function hasBroadcastFrame(node: Blockwise): boolean {
  return node.dependencies().some((dep) => dep.ndim > 0 && node.isBroadcast(dep));
}

/**
 * Blockwise node that keeps every row: the output of partition `i` has the
 * rows of partition `i` of its input.
 */
export class Elemwise extends Blockwise {}

// =============================================================================
// Arithmetic & Comparison
// =============================================================================

/**
 * Element-wise binary operator.
 */
export class Binop extends Elemwise {
  static parameters = ['left', 'right'];

  get operator(): BinaryOperator {
    throw PlanError.notImplemented(this.kind.name, 'operator');
  }

  get left(): unknown {
    return this.operand('left');
  }

  get right(): unknown {
    return this.operand('right');
  }

  protected operation(args: readonly unknown[]): unknown {
    return binaryOp(this.operator, expectValue(args[0], this.kind.name), expectValue(args[1], this.kind.name));
  }

  toString(): string {
    const side = (value: unknown): string => (value instanceof Expr ? value.toString() : formatOperand(value));
    return `${side(this.left)} ${OPERATOR_SYMBOLS[this.operator]} ${side(this.right)}`;
  }
}

export class Add extends Binop {
  get operator(): BinaryOperator {
    return 'add';
  }

  /** `x + x → 2 * x` */
  simplify(): Expr | undefined {
    const { left, right } = this;
    if (left instanceof Expr && right instanceof Expr && left.name === right.name) {
      return new Mul(2, left);
    }
    return undefined;
  }
}

export class Sub extends Binop {
  get operator(): BinaryOperator {
    return 'sub';
  }
}

export class Mul extends Binop {
  get operator(): BinaryOperator {
    return 'mul';
  }

  /** `a * (b * c) → (a * b) * c` for numeric `a` and `b` */
  simplify(): Expr | undefined {
    const { left, right } = this;
    if (typeof left === 'number' && right instanceof Mul && typeof right.left === 'number') {
      return new Mul(left * right.left, right.right);
    }
    return undefined;
  }
}

export class Div extends Binop {
  get operator(): BinaryOperator {
    return 'div';
  }
}

export class LT extends Binop {
  get operator(): BinaryOperator {
    return 'lt';
  }
}

export class LE extends Binop {
  get operator(): BinaryOperator {
    return 'le';
  }
}

export class GT extends Binop {
  get operator(): BinaryOperator {
    return 'gt';
  }
}

export class GE extends Binop {
  get operator(): BinaryOperator {
    return 'ge';
  }
}

export class EQ extends Binop {
  get operator(): BinaryOperator {
    return 'eq';
  }
}

export class NE extends Binop {
  get operator(): BinaryOperator {
    return 'ne';
  }
}

/** Comparison operators, by which a predicate can be flipped and absorbed into IO. */
export type Comparison = LT | LE | GT | GE | EQ | NE;

export function isComparison(expr: Expr): expr is Comparison {
  return (
    expr instanceof LT ||
    expr instanceof LE ||
    expr instanceof GT ||
    expr instanceof GE ||
    expr instanceof EQ ||
    expr instanceof NE
  );
}

// Free builders, for a literal on the left
export const add = (left: unknown, right: unknown): Expr => new Add(left, right);
export const sub = (left: unknown, right: unknown): Expr => new Sub(left, right);
export const mul = (left: unknown, right: unknown): Expr => new Mul(left, right);
export const div = (left: unknown, right: unknown): Expr => new Div(left, right);
export const lt = (left: unknown, right: unknown): Expr => new LT(left, right);
export const le = (left: unknown, right: unknown): Expr => new LE(left, right);
export const gt = (left: unknown, right: unknown): Expr => new GT(left, right);
export const ge = (left: unknown, right: unknown): Expr => new GE(left, right);
export const eq = (left: unknown, right: unknown): Expr => new EQ(left, right);
export const ne = (left: unknown, right: unknown): Expr => new NE(left, right);

// =============================================================================
// Selection
// =============================================================================

const isSubset = (inner: readonly string[], outer: readonly string[]): boolean =>
  inner.every((name) => outer.includes(name));

const keyColumns = (key: ColumnKey): readonly string[] => (typeof key === 'string' ? [key] : key);

/**
 * Keep rows where `predicate` is true.
 */
export class Filter extends Blockwise {
  static parameters = ['frame', 'predicate'];

  get frame(): Expr {
    return this.exprOperand('frame');
  }

  get predicate(): Expr {
    return this.exprOperand('predicate');
  }

  protected operation(args: readonly unknown[]): unknown {
    return filterRows(expectValue(args[0], 'Filter'), expectValue(args[1], 'Filter'));
  }
}

/**
 * Column selection: a string yields a Series, a list yields a frame.
 */
export class Projection extends Elemwise {
  static parameters = ['frame', 'columns'];

  get frame(): Expr {
    return this.exprOperand('frame');
  }

  get key(): ColumnKey {
    const key = this.operand('columns');
    if (isColumnKey(key)) return key;
    throw ValidationError.typeMismatch('Projection.columns', 'a column name or list of names', describeValue(key));
  }

  protected operation(args: readonly unknown[]): unknown {
    return getItem(expectValue(args[0], 'Projection'), this.key);
  }

  simplify(): Expr | undefined {
    const { frame, key } = this;
    const wanted = keyColumns(key);

    // Selecting every column in order is a no-op
    if (typeof key !== 'string' && frame.ndim === 2) {
      const current = frame.columns;
      if (current.length === key.length && current.every((c, i) => key[i] === c)) return frame;
    }

    // df[a][b] → df[b]
    if (frame instanceof Projection && typeof frame.key !== 'string' && isSubset(wanted, frame.key)) {
      return new Projection(frame.frame, key);
    }

    // df[cond][cols] → df[cols][cond]
    if (frame instanceof Filter) {
      return new Filter(new Projection(frame.frame, key), frame.predicate);
    }

    // (a ∘ b)[cols] → a[cols] ∘ b[cols]
    if (frame instanceof Binop) {
      const exprs = frame.dependencies();
      if (exprs.length > 0 && exprs.every((dep) => dep.ndim === 2 && isSubset(wanted, dep.columns))) {
        return frame.withOperands(frame.operands.map((op) => (op instanceof Expr ? new Projection(op, key) : op)));
      }
    }

    // Columns not involving an assignment skip it
    if (frame instanceof Assign && !wanted.includes(frame.key)) {
      return new Projection(frame.frame, key);
    }
    return undefined;
  }
}

/**
 * The index as a Series.
 */
export class ProjectIndex extends Elemwise {
  static parameters = ['frame'];

  get frame(): Expr {
    return this.exprOperand('frame');
  }

  protected operation(args: readonly unknown[]): unknown {
    return indexOf(expectValue(args[0], 'ProjectIndex'));
  }
}

// =============================================================================
// Transformation
// =============================================================================

/**
 * Add or replace one column.
 */
export class Assign extends Elemwise {
  static parameters = ['frame', 'key', 'value'];

  get frame(): Expr {
    return this.exprOperand('frame');
  }

  get key(): string {
    return this.stringOperand('key');
  }

  protected operation(args: readonly unknown[]): unknown {
    return assign(expectValue(args[0], 'Assign'), this.key, expectValue(args[2], 'Assign'));
  }
}

function isDTypeSpec(value: unknown): value is DTypeSpec {
  if (isDType(value)) return true;
  return typeof value === 'object' && value !== null && !Array.isArray(value) && Object.values(value).every(isDType);
}

export class AsType extends Elemwise {
  static parameters = ['frame', 'dtypes'];

  get frame(): Expr {
    return this.exprOperand('frame');
  }

  get dtypeSpec(): DTypeSpec {
    const value = this.operand('dtypes');
    if (isDTypeSpec(value)) return value;
    throw ValidationError.typeMismatch('AsType.dtypes', 'a dtype or mapping of dtypes', describeValue(value));
  }

  protected operation(args: readonly unknown[]): unknown {
    return astype(expectValue(args[0], 'AsType'), this.dtypeSpec);
  }
}

function isApplyFunction(value: unknown): value is ApplyFunction {
  return typeof value === 'function';
}

/**
 * Element-wise user function. The result dtype is `dtype` when given, the
 * input dtype otherwise.
 */
export class Apply extends Elemwise {
  static parameters = ['frame', 'fn', 'args', 'kwargs', 'dtype'];
  static defaults = { args: [], kwargs: {}, dtype: null };

  get frame(): Expr {
    return this.exprOperand('frame');
  }

  get fn(): ApplyFunction {
    const fn = this.operand('fn');
    if (isApplyFunction(fn)) return fn;
    throw ValidationError.typeMismatch('Apply.fn', 'a function', describeValue(fn));
  }

  protected taskKwargs(): Readonly<Record<string, unknown>> {
    const kwargs = this.operand('kwargs');
    if (typeof kwargs === 'object' && kwargs !== null && !Array.isArray(kwargs)) {
      return Object.fromEntries(Object.entries(kwargs));
    }
    throw ValidationError.typeMismatch('Apply.kwargs', 'a record', describeValue(kwargs));
  }

  protected operation(args: readonly unknown[], kwargs: Readonly<Record<string, unknown>>): unknown {
    const extra = args[2];
    const dtype = args[4];
    return applyValues(
      expectValue(args[0], 'Apply'),
      this.fn,
      Array.isArray(extra) ? extra : [],
      kwargs,
      isDType(dtype) ? dtype : null
    );
  }
}

// =============================================================================
// Head
// =============================================================================

/**
 * First `n` rows, taken from the first partition.
 */
export class Head extends Expr {
  static parameters = ['frame', 'n'];
  static defaults = { n: 5 };

  get frame(): Expr {
    return this.exprOperand('frame');
  }

  get n(): number {
    return this.numberOperand('n');
  }

  protected computeMeta(): Value {
    return this.frame.meta;
  }

  protected computeDivisions(): Divisions {
    const divisions = this.frame.divisions;
    return [divisions[0], divisions[1]];
  }

  simplify(): Expr | undefined {
    const { frame, n } = this;
    if (frame instanceof Head) {
      return new Head(frame.frame, Math.min(n, frame.n));
    }
    // Projections stay above so the leaf can absorb them
    if (frame instanceof Elemwise && !(frame instanceof Projection) && !hasBroadcastFrame(frame)) {
      return frame.withOperands(
        frame.operands.map((op) => (op instanceof Expr && op.ndim > 0 ? new Head(op, n) : op))
      );
    }
    if (frame.npartitions > 1) {
      return new Head(new Partitions(frame, [0]), n);
    }
    return undefined;
  }

  task(_index: number): Task {
    const n = this.n;
    return { fn: (args) => head(expectValue(args[0], 'Head'), n), args: [ref(this.frame.name, 0)] };
  }
}

// =============================================================================
// Partitions
// =============================================================================

/**
 * Lazy selection of some partitions of `frame`, in the given order.
 */
export class Partitions extends Expr {
  static parameters = ['frame', 'partitions'];

  get frame(): Expr {
    return this.exprOperand('frame');
  }

  get partitionIndices(): number[] {
    const value = this.operand('partitions');
    if (Array.isArray(value) && value.every((v): v is number => typeof v === 'number')) return [...value];
    throw ValidationError.typeMismatch('Partitions.partitions', 'a list of partition indices', describeValue(value));
  }

  protected computeMeta(): Value {
    return this.frame.meta;
  }

  protected computeDivisions(): Divisions {
    return selectDivisions(this.frame.divisions, this.partitionIndices);
  }

  simplify(): Expr | undefined {
    const { frame } = this;
    const indices = this.partitionIndices;
    if (frame instanceof Partitions) {
      const inner = frame.partitionIndices;
      return new Partitions(frame.frame, indices.map((i) => inner[i]));
    }
    if (frame instanceof Blockwise && !hasBroadcastFrame(frame)) {
      return frame.withOperands(
        frame.operands.map((op) => (op instanceof Expr && op.ndim > 0 ? new Partitions(op, indices) : op))
      );
    }
    return undefined;
  }

  task(index: number): Task {
    return aliasTask(taskKey(this.frame.name, this.partitionIndices[index]));
  }
}
