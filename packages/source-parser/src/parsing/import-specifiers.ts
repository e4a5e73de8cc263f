import * as ts from "typescript";

const literalText = (expression: ts.Expression | undefined): string | undefined => {
  if (expression === undefined) {
    return undefined;
  }

  if (ts.isStringLiteral(expression) || ts.isNoSubstitutionTemplateLiteral(expression)) {
    return expression.text;
  }

  return undefined;
};

const importsRuntimeBinding = (declaration: ts.ImportDeclaration): boolean => {
  const clause = declaration.importClause;
  if (clause === undefined) {
    return true;
  }

  if (clause.isTypeOnly) {
    return false;
  }

  if (clause.name !== undefined) {
    return true;
  }

  const bindings = clause.namedBindings;
  if (bindings === undefined || ts.isNamespaceImport(bindings)) {
    return true;
  }

  return bindings.elements.length === 0 || bindings.elements.some((element) => !element.isTypeOnly);
};

const specifierOf = (node: ts.Node): string | undefined => {
  if (ts.isImportDeclaration(node)) {
    return importsRuntimeBinding(node) ? literalText(node.moduleSpecifier) : undefined;
  }

  if (ts.isExportDeclaration(node)) {
    return node.isTypeOnly ? undefined : literalText(node.moduleSpecifier);
  }

  if (ts.isImportEqualsDeclaration(node)) {
    if (node.isTypeOnly || !ts.isExternalModuleReference(node.moduleReference)) {
      return undefined;
    }

    return literalText(node.moduleReference.expression);
  }

  if (!ts.isCallExpression(node)) {
    return undefined;
  }

  const isDynamicImport = node.expression.kind === ts.SyntaxKind.ImportKeyword;
  const isRequire = ts.isIdentifier(node.expression) && node.expression.text === "require";
  return isDynamicImport || isRequire ? literalText(node.arguments[0]) : undefined;
};

/**
 * Collects the module specifiers a file depends on at runtime, deduplicated and
 * in source order. Type-only imports and exports are left out.
 */
export const extractImportSpecifiers = (sourceFile: ts.SourceFile): readonly string[] => {
  const specifiers = new Set<string>();

  const visit = (node: ts.Node): void => {
    const specifier = specifierOf(node);
    if (specifier !== undefined) {
      specifiers.add(specifier);
    }

    if (ts.isImportDeclaration(node) || ts.isExportDeclaration(node)) {
      return;
    }

    ts.forEachChild(node, visit);
  };

  visit(sourceFile);
  return [...specifiers];
};
