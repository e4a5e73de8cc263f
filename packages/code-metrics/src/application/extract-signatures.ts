import * as ts from "typescript";
import { asRecordedFunction } from "../domain/recorded-function.js";

const collapseWhitespace = (text: string): string => text.replace(/\s+/g, " ").trim();

const signatureStart = (node: ts.Node, sourceFile: ts.SourceFile): number => {
  const parent = node.parent;
  const bound =
    (ts.isArrowFunction(node) || ts.isFunctionExpression(node)) &&
    (ts.isVariableDeclaration(parent) ||
      ts.isPropertyDeclaration(parent) ||
      ts.isPropertyAssignment(parent) ||
      ts.isExportAssignment(parent));

  return bound ? parent.getStart(sourceFile) : node.getStart(sourceFile);
};

/**
 * Declaration headers without their bodies, in source order: classes and every
 * recorded function, decorators and modifiers included. This is the outline an
 * agent keeps in context while it works on a file.
 */
export const extractSignatures = (sourceFile: ts.SourceFile): readonly string[] => {
  const signatures: string[] = [];
  const text = sourceFile.text;

  const visit = (node: ts.Node): void => {
    if (ts.isClassDeclaration(node)) {
      signatures.push(collapseWhitespace(text.slice(node.getStart(sourceFile), node.members.pos - 1)));
    } else {
      const recorded = asRecordedFunction(node, sourceFile);
      const body = recorded?.node.body;
      if (body !== undefined) {
        signatures.push(collapseWhitespace(text.slice(signatureStart(node, sourceFile), body.getStart(sourceFile))));
      }
    }

    ts.forEachChild(node, visit);
  };

  visit(sourceFile);
  return signatures;
};
