import ts from "typescript";
import { declarationFactsOf, parseTypeScript, toTypeScriptNode } from "./typescript.ts";
import type { SemanticModel, SyntaxNode, SyntaxTree, TypeFacts } from "./types.ts";

export const DEFAULT_PROGRAM_OPTIONS: ts.CompilerOptions = {
  allowJs: true,
  noEmit: true,
  skipLibCheck: true,
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  moduleResolution: ts.ModuleResolutionKind.Bundler,
};

export type TypeScriptProject = {
  program: ts.Program;
  semantics: SemanticModel;
  /** Tree over the program's own source file, so the checker can resolve its nodes. */
  parse(fileName: string): SyntaxTree | null;
};

export function createTypeScriptProject(
  fileNames: readonly string[],
  compilerOptions: ts.CompilerOptions = DEFAULT_PROGRAM_OPTIONS,
): TypeScriptProject {
  const program = ts.createProgram({ rootNames: fileNames, options: compilerOptions });
  const checker = program.getTypeChecker();

  return {
    program,
    semantics: createCheckerSemanticModel(checker),
    parse(fileName) {
      const sourceFile = program.getSourceFile(fileName);
      return sourceFile ? parseTypeScript(fileName, sourceFile.text, { sourceFile }) : null;
    },
  };
}

export function createCheckerSemanticModel(checker: ts.TypeChecker): SemanticModel {
  return {
    typeOf(node) {
      const tsNode = toTypeScriptNode(node);
      return tsNode ? describeType(checker, checker.getTypeAtLocation(tsNode), new Set()) : null;
    },
    declarationOf(node) {
      const declaration = resolveDeclaration(checker, node);
      return declaration ? declarationFactsOf(declaration, declaration.getSourceFile()) : null;
    },
    isDeprecated(node) {
      const symbol = resolveSymbol(checker, node);
      return (symbol?.declarations ?? []).some(
        (declaration) => ts.getJSDocDeprecatedTag(declaration) !== undefined,
      );
    },
  };
}

function resolveSymbol(checker: ts.TypeChecker, node: SyntaxNode): ts.Symbol | undefined {
  let tsNode = toTypeScriptNode(node);
  if (!tsNode) {
    return undefined;
  }
  if (ts.isCallExpression(tsNode) || ts.isNewExpression(tsNode) || ts.isDecorator(tsNode)) {
    tsNode = tsNode.expression;
  }
  if (ts.isPropertyAccessExpression(tsNode)) {
    tsNode = tsNode.name;
  }

  const symbol = checker.getSymbolAtLocation(tsNode);
  if (symbol && symbol.flags & ts.SymbolFlags.Alias) {
    return checker.getAliasedSymbol(symbol);
  }
  return symbol;
}

function resolveDeclaration(checker: ts.TypeChecker, node: SyntaxNode): ts.Declaration | undefined {
  const symbol = resolveSymbol(checker, node);
  return symbol?.valueDeclaration ?? symbol?.declarations?.[0];
}

function describeType(checker: ts.TypeChecker, type: ts.Type, seen: Set<ts.Type>): TypeFacts {
  seen.add(type);
  const symbol = type.getSymbol();
  const name = primitiveName(type) ?? symbol?.getName() ?? checker.typeToString(type);
  const qualifiedName = symbol ? stripModulePrefix(checker.getFullyQualifiedName(symbol)) : name;

  let elementType: TypeFacts | null = null;
  if (name === "Array" || name === "ReadonlyArray") {
    const element = checker.getIndexTypeOfType(type, ts.IndexKind.Number);
    if (element && !seen.has(element)) {
      elementType = describeType(checker, element, seen);
    }
  }

  return {
    name,
    qualifiedName,
    supertypes: collectSupertypes(checker, type, new Set([type])),
    elementType,
  };
}

function collectSupertypes(checker: ts.TypeChecker, type: ts.Type, seen: Set<ts.Type>): string[] {
  const direct: ts.Type[] = [];
  if (type.isClassOrInterface()) {
    direct.push(...checker.getBaseTypes(type));
  }
  for (const declaration of type.getSymbol()?.declarations ?? []) {
    if (!ts.isClassDeclaration(declaration) && !ts.isClassExpression(declaration)) {
      continue;
    }
    for (const clause of declaration.heritageClauses ?? []) {
      if (clause.token !== ts.SyntaxKind.ImplementsKeyword) {
        continue;
      }
      for (const implemented of clause.types) {
        direct.push(checker.getTypeAtLocation(implemented.expression));
      }
    }
  }

  const names: string[] = [];
  for (const supertype of direct) {
    if (seen.has(supertype)) {
      continue;
    }
    seen.add(supertype);
    const symbol = supertype.getSymbol();
    if (symbol) {
      names.push(symbol.getName(), stripModulePrefix(checker.getFullyQualifiedName(symbol)));
    }
    names.push(...collectSupertypes(checker, supertype, seen));
  }
  return [...new Set(names)];
}

function primitiveName(type: ts.Type): string | null {
  if (type.flags & ts.TypeFlags.StringLike) return "string";
  if (type.flags & ts.TypeFlags.NumberLike) return "number";
  if (type.flags & ts.TypeFlags.BooleanLike) return "boolean";
  if (type.flags & ts.TypeFlags.BigIntLike) return "bigint";
  return null;
}

// Fully qualified names of module members start with the quoted module path.
function stripModulePrefix(name: string): string {
  return name.replace(/^".*?"\./, "");
}
