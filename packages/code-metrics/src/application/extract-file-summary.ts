import type { FileSummary, FunctionRecord } from "@readyscore/core";
import * as ts from "typescript";
import {
  asRecordedFunction,
  hasDocComment,
  isAsyncFunction,
  measureTypeCoverage,
  propertyNameText,
  type RecordedFunction,
} from "../domain/recorded-function.js";
import { DECISION_POINT_WEIGHTS, LOGICAL_LINE_KINDS } from "../domain/syntax-tables.js";

type OpenFunction = {
  recorded: RecordedFunction;
  qualifiedName: string;
  startLine: number;
  endLine: number;
  complexity: number;
  lines: Set<number>;
};

const boundName = (node: ts.Node, sourceFile: ts.SourceFile): string | undefined => {
  const parent = node.parent;
  if (ts.isVariableDeclaration(parent) && parent.initializer === node && ts.isIdentifier(parent.name)) {
    return parent.name.text;
  }

  if (ts.isPropertyAssignment(parent) && parent.initializer === node) {
    return propertyNameText(parent.name, sourceFile);
  }

  return undefined;
};

// Scopes that contribute a segment to qualified names besides recorded functions.
const containerName = (node: ts.Node, sourceFile: ts.SourceFile): string | undefined => {
  if (ts.isClassDeclaration(node)) {
    return node.name?.text ?? "default";
  }

  if (ts.isClassExpression(node)) {
    return node.name?.text ?? boundName(node, sourceFile) ?? "anonymous";
  }

  if (ts.isModuleDeclaration(node)) {
    return node.name.text;
  }

  if (ts.isObjectLiteralExpression(node)) {
    return boundName(node, sourceFile);
  }

  return undefined;
};

const toFunctionRecord = (open: OpenFunction, filePath: string): FunctionRecord => ({
  name: open.recorded.name,
  qualifiedName: open.qualifiedName,
  filePath,
  startLine: open.startLine,
  endLine: open.endLine,
  complexity: open.complexity,
  logicalLines: open.lines.size,
  typeCoverage: measureTypeCoverage(open.recorded.node),
  hasDocstring: hasDocComment(open.recorded.node),
  isAsync: isAsyncFunction(open.recorded.node),
});

/**
 * Walks one parsed file and produces its summary with one record per recorded
 * function, in source order.
 *
 * Decision points count toward the innermost recorded function only. Logical
 * lines count toward every enclosing function, since a nested function is part
 * of the text an agent reads when it opens the outer one.
 */
export const extractFileSummary = (sourceFile: ts.SourceFile, filePath: string): FileSummary => {
  const fileLines = new Set<number>();
  const opened: OpenFunction[] = [];

  const lineOf = (position: number): number => sourceFile.getLineAndCharacterOfPosition(position).line + 1;

  const markLine = (line: number, active: readonly OpenFunction[]): void => {
    fileLines.add(line);
    for (const open of active) {
      open.lines.add(line);
    }
  };

  const visit = (node: ts.Node, scope: readonly string[], active: readonly OpenFunction[]): void => {
    if (ts.isDecorator(node)) {
      return;
    }

    const owner = active[active.length - 1];
    const weight = DECISION_POINT_WEIGHTS.get(node.kind);
    if (owner !== undefined && weight !== undefined) {
      owner.complexity += weight;
    }

    if (LOGICAL_LINE_KINDS.has(node.kind)) {
      markLine(lineOf(node.getStart(sourceFile)), active);
    }

    const recorded = asRecordedFunction(node, sourceFile);
    if (recorded !== undefined) {
      const startLine = lineOf(node.getStart(sourceFile));
      const open: OpenFunction = {
        recorded,
        qualifiedName: [...scope, recorded.name].join("."),
        startLine,
        endLine: lineOf(node.end),
        complexity: 1,
        lines: new Set([startLine]),
      };
      markLine(startLine, active);
      opened.push(open);

      const innerScope = [...scope, recorded.name];
      const innerActive = [...active, open];
      ts.forEachChild(node, (child) => visit(child, innerScope, innerActive));
      return;
    }

    const container = containerName(node, sourceFile);
    const innerScope = container === undefined ? scope : [...scope, container];
    ts.forEachChild(node, (child) => visit(child, innerScope, active));
  };

  visit(sourceFile, [], []);

  const functions = opened.map((open) => toFunctionRecord(open, filePath));
  const typedCount = functions.filter((record) => record.typeCoverage > 0).length;

  return {
    filePath,
    logicalLines: fileLines.size,
    functions,
    typeCoverage: functions.length === 0 ? 1 : typedCount / functions.length,
  };
};
