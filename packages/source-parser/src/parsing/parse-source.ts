import { extname } from "node:path";
import * as ts from "typescript";

export type ParseSourceResult =
  | { ok: true; sourceFile: ts.SourceFile }
  | { ok: false; reason: string };

// A single-file program: no lib, no module resolution, only syntax is checked.
const PARSE_OPTIONS: ts.CompilerOptions = {
  allowJs: true,
  noLib: true,
  noResolve: true,
  types: [],
  target: ts.ScriptTarget.Latest,
};

const scriptKindByExtension: Readonly<Record<string, ts.ScriptKind>> = {
  ".ts": ts.ScriptKind.TS,
  ".mts": ts.ScriptKind.TS,
  ".cts": ts.ScriptKind.TS,
  ".tsx": ts.ScriptKind.TSX,
  ".js": ts.ScriptKind.JS,
  ".mjs": ts.ScriptKind.JS,
  ".cjs": ts.ScriptKind.JS,
  ".jsx": ts.ScriptKind.JSX,
};

const scriptKindOf = (fileName: string): ts.ScriptKind =>
  scriptKindByExtension[extname(fileName)] ?? ts.ScriptKind.Unknown;

const describeDiagnostic = (diagnostic: ts.Diagnostic): string => {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, " ");
  if (diagnostic.file === undefined || diagnostic.start === undefined) {
    return message;
  }

  const { line } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
  return `line ${line + 1}: ${message}`;
};

export const parseSource = (fileName: string, text: string): ParseSourceResult => {
  const sourceFile = ts.createSourceFile(
    fileName,
    text,
    ts.ScriptTarget.Latest,
    true,
    scriptKindOf(fileName),
  );

  const defaultHost = ts.createCompilerHost(PARSE_OPTIONS, true);
  const host: ts.CompilerHost = {
    ...defaultHost,
    fileExists: (requested) => requested === sourceFile.fileName,
    readFile: (requested) => (requested === sourceFile.fileName ? text : undefined),
    getSourceFile: (requested) => (requested === sourceFile.fileName ? sourceFile : undefined),
  };

  const program = ts.createProgram({
    rootNames: [sourceFile.fileName],
    options: PARSE_OPTIONS,
    host,
  });

  const [firstDiagnostic] = program.getSyntacticDiagnostics(sourceFile);
  if (firstDiagnostic !== undefined) {
    return { ok: false, reason: describeDiagnostic(firstDiagnostic) };
  }

  return { ok: true, sourceFile };
};
