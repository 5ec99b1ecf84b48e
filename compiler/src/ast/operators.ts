/**
 * Syntactic operators.
 *
 * An operator is not a value by itself: it names an overload set in the
 * operator table, and an `OperatorExpr` in callee position is resolved
 * against that set once the argument types are known.
 */

export enum Operator {
  // Unary
  Plus = "Plus",
  Minus = "Minus",
  Recip = "Recip",
  LogicalNot = "LogicalNot",
  BitNot = "BitNot",
  PreInc = "PreInc",
  PreDec = "PreDec",
  PostInc = "PostInc",
  PostDec = "PostDec",
  // Binary
  Add = "Add",
  Sub = "Sub",
  Mul = "Mul",
  Div = "Div",
  Rem = "Rem",
  LeftShift = "LeftShift",
  RightShift = "RightShift",
  ForwardShift = "ForwardShift",
  BackwardShift = "BackwardShift",
  Equal = "Equal",
  NotEqual = "NotEqual",
  Less = "Less",
  LessEqual = "LessEqual",
  Greater = "Greater",
  GreaterEqual = "GreaterEqual",
  LogicalAnd = "LogicalAnd",
  LogicalOr = "LogicalOr",
  BitAnd = "BitAnd",
  BitOr = "BitOr",
  BitXor = "BitXor",
  // Assignment
  Assign = "Assign",
  AddAssign = "AddAssign",
  SubAssign = "SubAssign",
  MulAssign = "MulAssign",
  DivAssign = "DivAssign",
  RemAssign = "RemAssign",
  BitAndAssign = "BitAndAssign",
  BitOrAssign = "BitOrAssign",
  BitXorAssign = "BitXorAssign",
  LeftShiftAssign = "LeftShiftAssign",
  RightShiftAssign = "RightShiftAssign",
  ForwardShiftAssign = "ForwardShiftAssign",
  BackwardShiftAssign = "BackwardShiftAssign",
}

const OPERATOR_NAMES: Record<Operator, string> = {
  [Operator.Plus]: "plus",
  [Operator.Minus]: "minus",
  [Operator.Recip]: "reciprocal",
  [Operator.LogicalNot]: "logical not",
  [Operator.BitNot]: "bitwise not",
  [Operator.PreInc]: "prefix increment",
  [Operator.PreDec]: "prefix decrement",
  [Operator.PostInc]: "postfix increment",
  [Operator.PostDec]: "postfix decrement",
  [Operator.Add]: "add",
  [Operator.Sub]: "sub",
  [Operator.Mul]: "mul",
  [Operator.Div]: "div",
  [Operator.Rem]: "rem",
  [Operator.LeftShift]: "left shift",
  [Operator.RightShift]: "right shift",
  [Operator.ForwardShift]: "forward shift",
  [Operator.BackwardShift]: "backward shift",
  [Operator.Equal]: "equal to",
  [Operator.NotEqual]: "not equal to",
  [Operator.Less]: "less than",
  [Operator.LessEqual]: "less than or equal to",
  [Operator.Greater]: "greater than",
  [Operator.GreaterEqual]: "greater than or equal to",
  [Operator.LogicalAnd]: "logical and",
  [Operator.LogicalOr]: "logical or",
  [Operator.BitAnd]: "bitwise and",
  [Operator.BitOr]: "bitwise or",
  [Operator.BitXor]: "bitwise xor",
  [Operator.Assign]: "assign",
  [Operator.AddAssign]: "add assign",
  [Operator.SubAssign]: "sub assign",
  [Operator.MulAssign]: "mul assign",
  [Operator.DivAssign]: "div assign",
  [Operator.RemAssign]: "rem assign",
  [Operator.BitAndAssign]: "bitwise and assign",
  [Operator.BitOrAssign]: "bitwise or assign",
  [Operator.BitXorAssign]: "bitwise xor assign",
  [Operator.LeftShiftAssign]: "left shift assign",
  [Operator.RightShiftAssign]: "right shift assign",
  [Operator.ForwardShiftAssign]: "forward shift assign",
  [Operator.BackwardShiftAssign]: "backward shift assign",
};

/** Human-readable operator name, as used in dumps and diagnostics. */
export function operatorName(op: Operator): string {
  return OPERATOR_NAMES[op];
}

/**
 * Compound assignments and the binary operator each one applies before
 * storing. `Assign` itself maps to `null` (plain store).
 */
const ASSIGN_OPERATORS: ReadonlyMap<Operator, Operator | null> = new Map([
  [Operator.Assign, null],
  [Operator.AddAssign, Operator.Add],
  [Operator.SubAssign, Operator.Sub],
  [Operator.MulAssign, Operator.Mul],
  [Operator.DivAssign, Operator.Div],
  [Operator.RemAssign, Operator.Rem],
  [Operator.BitAndAssign, Operator.BitAnd],
  [Operator.BitOrAssign, Operator.BitOr],
  [Operator.BitXorAssign, Operator.BitXor],
  [Operator.LeftShiftAssign, Operator.LeftShift],
  [Operator.RightShiftAssign, Operator.RightShift],
  [Operator.ForwardShiftAssign, Operator.ForwardShift],
  [Operator.BackwardShiftAssign, Operator.BackwardShift],
]);

const STEP_OPERATORS: ReadonlyMap<Operator, { apply: Operator; yieldsOld: boolean }> = new Map([
  [Operator.PreInc, { apply: Operator.Add, yieldsOld: false }],
  [Operator.PreDec, { apply: Operator.Sub, yieldsOld: false }],
  [Operator.PostInc, { apply: Operator.Add, yieldsOld: true }],
  [Operator.PostDec, { apply: Operator.Sub, yieldsOld: true }],
]);

export function isAssignOperator(op: Operator): boolean {
  return ASSIGN_OPERATORS.has(op);
}

/** For `x op= y`, the binary operator applied to `x` and `y`; `null` for plain `=`. */
export function assignBaseOperator(op: Operator): Operator | null {
  return ASSIGN_OPERATORS.get(op) ?? null;
}

export function isStepOperator(op: Operator): boolean {
  return STEP_OPERATORS.has(op);
}

/** Increment/decrement: the arithmetic operator it applies and whether the old value is yielded. */
export function stepOperatorInfo(op: Operator): { apply: Operator; yieldsOld: boolean } | undefined {
  return STEP_OPERATORS.get(op);
}

/** Operators that write to their first operand and never live in the operator table. */
export function isMutatingOperator(op: Operator): boolean {
  return isAssignOperator(op) || isStepOperator(op);
}
