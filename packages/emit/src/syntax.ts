/**
 * Emit Package - Syntax Check
 *
 * Parses generated source with the TypeScript compiler. Only syntax is
 * checked; the generated modules are not type-checked here.
 */

import ts from "typescript";

export interface SyntaxDiagnostic {
  fileName: string;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
  message: string;
}

/**
 * Syntactic diagnostics of `source`, empty when it parses cleanly.
 */
export function checkSyntax(source: string, fileName: string): SyntaxDiagnostic[] {
  const output = ts.transpileModule(source, {
    fileName,
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.ESNext,
    },
  });
  return (output.diagnostics ?? []).map(diagnostic => toSyntaxDiagnostic(diagnostic, fileName));
}

export function formatSyntaxDiagnostic(diagnostic: SyntaxDiagnostic): string {
  return `${diagnostic.fileName}:${diagnostic.line}:${diagnostic.column} - ${diagnostic.message}`;
}

function toSyntaxDiagnostic(diagnostic: ts.Diagnostic, fileName: string): SyntaxDiagnostic {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n");
  if (!diagnostic.file || diagnostic.start === undefined) {
    return { fileName, line: 0, column: 0, message };
  }
  const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
  return { fileName, line: line + 1, column: character + 1, message };
}
