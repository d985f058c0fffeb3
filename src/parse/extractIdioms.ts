import ts from "typescript";
import { stringCompareBinary } from "../determinism/CanonicalOrder.js";

/** One function body: what it calls, and which statement kinds it is built from. */
export interface IdiomObservation {
  scope: string;
  line: number;
  calls: string[];
  statements: string[];
}

const STATEMENT_KINDS = new Map<ts.SyntaxKind, string>([
  [ts.SyntaxKind.VariableStatement, "VariableStatement"],
  [ts.SyntaxKind.ExpressionStatement, "ExpressionStatement"],
  [ts.SyntaxKind.IfStatement, "IfStatement"],
  [ts.SyntaxKind.DoStatement, "DoStatement"],
  [ts.SyntaxKind.WhileStatement, "WhileStatement"],
  [ts.SyntaxKind.ForStatement, "ForStatement"],
  [ts.SyntaxKind.ForInStatement, "ForInStatement"],
  [ts.SyntaxKind.ForOfStatement, "ForOfStatement"],
  [ts.SyntaxKind.ContinueStatement, "ContinueStatement"],
  [ts.SyntaxKind.BreakStatement, "BreakStatement"],
  [ts.SyntaxKind.ReturnStatement, "ReturnStatement"],
  [ts.SyntaxKind.WithStatement, "WithStatement"],
  [ts.SyntaxKind.SwitchStatement, "SwitchStatement"],
  [ts.SyntaxKind.LabeledStatement, "LabeledStatement"],
  [ts.SyntaxKind.ThrowStatement, "ThrowStatement"],
  [ts.SyntaxKind.TryStatement, "TryStatement"],
  [ts.SyntaxKind.DebuggerStatement, "DebuggerStatement"],
]);

type FunctionWithBody = ts.FunctionLikeDeclaration & { body: ts.ConciseBody };

function isFunctionWithBody(node: ts.Node): node is FunctionWithBody {
  return (
    (ts.isFunctionDeclaration(node) ||
      ts.isMethodDeclaration(node) ||
      ts.isConstructorDeclaration(node) ||
      ts.isGetAccessorDeclaration(node) ||
      ts.isSetAccessorDeclaration(node) ||
      ts.isFunctionExpression(node) ||
      ts.isArrowFunction(node)) &&
    node.body !== undefined
  );
}

function calleeName(expr: ts.Expression): string | undefined {
  if (ts.isIdentifier(expr)) return expr.text;
  if (ts.isPropertyAccessExpression(expr)) return expr.name.text;
  if (expr.kind === ts.SyntaxKind.SuperKeyword) return "super";
  return undefined;
}

function scopeName(node: FunctionWithBody): string {
  if (ts.isConstructorDeclaration(node)) return "constructor";
  const name = node.name;
  if (name && (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isPrivateIdentifier(name))) {
    return name.text;
  }
  const parent = node.parent;
  if (parent && ts.isVariableDeclaration(parent) && ts.isIdentifier(parent.name)) return parent.name.text;
  if (parent && ts.isPropertyAssignment(parent) && ts.isIdentifier(parent.name)) return parent.name.text;
  return "<anonymous>";
}

function collectBody(body: ts.Node): { calls: Set<string>; statements: Set<string> } {
  const calls = new Set<string>();
  const statements = new Set<string>();

  function visit(node: ts.Node): void {
    if (isFunctionWithBody(node)) return;
    if (ts.isCallExpression(node)) {
      const name = calleeName(node.expression);
      if (name) calls.add(name);
    } else if (ts.isNewExpression(node)) {
      const name = calleeName(node.expression);
      if (name) calls.add(`new ${name}`);
    } else {
      const kind = STATEMENT_KINDS.get(node.kind);
      if (kind) statements.add(kind);
    }
    ts.forEachChild(node, visit);
  }

  // An expression body is itself the first node of the body.
  if (ts.isBlock(body)) ts.forEachChild(body, visit);
  else visit(body);
  return { calls, statements };
}

function sorted(values: Set<string>): string[] {
  return [...values].sort((a, b) => stringCompareBinary(a, b));
}

/**
 * Parse one TypeScript file and return an observation per function body, in
 * source order. A nested function is its own observation and contributes
 * nothing to the body that encloses it.
 */
export function extractIdiomObservations(fileName: string, fileText: string): IdiomObservation[] {
  const sourceFile = ts.createSourceFile(
    fileName,
    fileText,
    ts.ScriptTarget.Latest,
    true,
    fileName.endsWith(".tsx") ? ts.ScriptKind.TSX : ts.ScriptKind.TS,
  );

  const out: IdiomObservation[] = [];

  function visit(node: ts.Node): void {
    if (isFunctionWithBody(node)) {
      const { calls, statements } = collectBody(node.body);
      const { line } = sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile));
      out.push({
        scope: scopeName(node),
        line: line + 1,
        calls: sorted(calls),
        statements: sorted(statements),
      });
    }
    ts.forEachChild(node, visit);
  }

  visit(sourceFile);
  return out;
}
