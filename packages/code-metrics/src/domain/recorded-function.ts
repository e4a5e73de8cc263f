import * as ts from "typescript";
import { RETURN_SLOT_BY_KIND } from "./syntax-tables.js";

export type FunctionNode =
  | ts.FunctionDeclaration
  | ts.MethodDeclaration
  | ts.ConstructorDeclaration
  | ts.GetAccessorDeclaration
  | ts.SetAccessorDeclaration
  | ts.FunctionExpression
  | ts.ArrowFunction;

export type RecordedFunction = {
  node: FunctionNode;
  name: string;
};

export const propertyNameText = (name: ts.PropertyName, sourceFile: ts.SourceFile): string =>
  ts.isComputedPropertyName(name) ? `[${name.expression.getText(sourceFile)}]` : name.text;

const bindingNameOf = (
  node: ts.FunctionExpression | ts.ArrowFunction,
  sourceFile: ts.SourceFile,
): string | undefined => {
  const parent = node.parent;
  if (ts.isVariableDeclaration(parent)) {
    return parent.initializer === node && ts.isIdentifier(parent.name) ? parent.name.text : undefined;
  }

  if (ts.isPropertyDeclaration(parent) || ts.isPropertyAssignment(parent)) {
    return parent.initializer === node ? propertyNameText(parent.name, sourceFile) : undefined;
  }

  return ts.isExportAssignment(parent) ? "default" : undefined;
};

/**
 * Returns the function this node defines when it is recorded on its own:
 * declarations with a body, and function or arrow expressions bound to a name.
 * Anything else (callbacks, overload signatures, abstract members) is not.
 */
export const asRecordedFunction = (
  node: ts.Node,
  sourceFile: ts.SourceFile,
): RecordedFunction | undefined => {
  if (ts.isFunctionDeclaration(node)) {
    return node.body === undefined ? undefined : { node, name: node.name?.text ?? "default" };
  }

  if (ts.isMethodDeclaration(node) || ts.isGetAccessorDeclaration(node) || ts.isSetAccessorDeclaration(node)) {
    return node.body === undefined ? undefined : { node, name: propertyNameText(node.name, sourceFile) };
  }

  if (ts.isConstructorDeclaration(node)) {
    return node.body === undefined ? undefined : { node, name: "constructor" };
  }

  if (ts.isFunctionExpression(node) || ts.isArrowFunction(node)) {
    const name = bindingNameOf(node, sourceFile);
    return name === undefined ? undefined : { node, name };
  }

  return undefined;
};

const isReceiver = (parameter: ts.ParameterDeclaration): boolean =>
  ts.isIdentifier(parameter.name) && parameter.name.text === "this";

// `const handler: Handler = (event) => ...` takes every slot from the declared type.
const isContextuallyTyped = (node: FunctionNode): boolean => {
  if (!ts.isFunctionExpression(node) && !ts.isArrowFunction(node)) {
    return false;
  }

  const parent = node.parent;
  return (ts.isVariableDeclaration(parent) || ts.isPropertyDeclaration(parent)) && parent.type !== undefined;
};

export const measureTypeCoverage = (node: FunctionNode): number => {
  const parameters = node.parameters.filter((parameter) => !isReceiver(parameter));
  const hasReturnSlot = RETURN_SLOT_BY_KIND.get(node.kind) ?? false;
  const slots = parameters.length + (hasReturnSlot ? 1 : 0);

  if (slots === 0 || isContextuallyTyped(node)) {
    return 1;
  }

  const annotatedParameters = parameters.filter((parameter) => parameter.type !== undefined).length;
  const annotatedReturn = hasReturnSlot && node.type !== undefined ? 1 : 0;
  return (annotatedParameters + annotatedReturn) / slots;
};

export const hasDocComment = (node: FunctionNode): boolean =>
  ts.getJSDocCommentsAndTags(node).some((entry) => ts.isJSDoc(entry));

export const isAsyncFunction = (node: FunctionNode): boolean =>
  ts.getModifiers(node)?.some((modifier) => modifier.kind === ts.SyntaxKind.AsyncKeyword) ?? false;
