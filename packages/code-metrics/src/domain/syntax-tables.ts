import * as ts from "typescript";

const { SyntaxKind } = ts;

/**
 * Complexity added by one node of the given kind. Logical operators are keyed by
 * their operator token, which the tree walk visits as a child of the binary
 * expression.
 */
export const DECISION_POINT_WEIGHTS: ReadonlyMap<ts.SyntaxKind, number> = new Map([
  [SyntaxKind.IfStatement, 1],
  [SyntaxKind.ForStatement, 1],
  [SyntaxKind.ForInStatement, 1],
  [SyntaxKind.ForOfStatement, 1],
  [SyntaxKind.WhileStatement, 1],
  [SyntaxKind.DoStatement, 1],
  [SyntaxKind.CatchClause, 1],
  [SyntaxKind.CaseClause, 1],
  [SyntaxKind.ConditionalExpression, 1],
  [SyntaxKind.AmpersandAmpersandToken, 1],
  [SyntaxKind.BarBarToken, 1],
  [SyntaxKind.QuestionQuestionToken, 1],
  [SyntaxKind.AmpersandAmpersandEqualsToken, 1],
  [SyntaxKind.BarBarEqualsToken, 1],
  [SyntaxKind.QuestionQuestionEqualsToken, 1],
]);

// Whether a function of this kind has a return-annotation slot.
export const RETURN_SLOT_BY_KIND: ReadonlyMap<ts.SyntaxKind, boolean> = new Map([
  [SyntaxKind.FunctionDeclaration, true],
  [SyntaxKind.MethodDeclaration, true],
  [SyntaxKind.GetAccessor, true],
  [SyntaxKind.FunctionExpression, true],
  [SyntaxKind.ArrowFunction, true],
  [SyntaxKind.Constructor, false],
  [SyntaxKind.SetAccessor, false],
]);

// Kinds that begin a logical line where they start.
export const LOGICAL_LINE_KINDS: ReadonlySet<ts.SyntaxKind> = new Set([
  SyntaxKind.VariableStatement,
  SyntaxKind.ExpressionStatement,
  SyntaxKind.ReturnStatement,
  SyntaxKind.IfStatement,
  SyntaxKind.ForStatement,
  SyntaxKind.ForInStatement,
  SyntaxKind.ForOfStatement,
  SyntaxKind.WhileStatement,
  SyntaxKind.DoStatement,
  SyntaxKind.SwitchStatement,
  SyntaxKind.CaseClause,
  SyntaxKind.DefaultClause,
  SyntaxKind.TryStatement,
  SyntaxKind.CatchClause,
  SyntaxKind.ThrowStatement,
  SyntaxKind.BreakStatement,
  SyntaxKind.ContinueStatement,
  SyntaxKind.LabeledStatement,
  SyntaxKind.DebuggerStatement,
  SyntaxKind.ImportDeclaration,
  SyntaxKind.ImportEqualsDeclaration,
  SyntaxKind.ExportDeclaration,
  SyntaxKind.ExportAssignment,
  SyntaxKind.FunctionDeclaration,
  SyntaxKind.ClassDeclaration,
  SyntaxKind.InterfaceDeclaration,
  SyntaxKind.TypeAliasDeclaration,
  SyntaxKind.EnumDeclaration,
  SyntaxKind.ModuleDeclaration,
  SyntaxKind.MethodDeclaration,
  SyntaxKind.PropertyDeclaration,
  SyntaxKind.Constructor,
  SyntaxKind.GetAccessor,
  SyntaxKind.SetAccessor,
  SyntaxKind.PropertySignature,
  SyntaxKind.MethodSignature,
  SyntaxKind.EnumMember,
]);
