import ts from "typescript";
import { PatternCompileError } from "../errors.ts";
import { isPlaceholderName, isVariadicPlaceholder } from "../pattern/placeholders.ts";
import type { PatternKind } from "../pattern/types.ts";
import type {
  DeclarationFacts,
  ElementKind,
  NodeRole,
  PatternTree,
  SyntaxLanguage,
  SyntaxNode,
  SyntaxSlot,
  SyntaxTree,
} from "./types.ts";

const PATTERN_FILE_NAME = "__pattern__.ts";
const PATTERN_FUNCTION = "__pattern__";
const PATTERN_CLASS = "__Pattern__";
// Appended to body-less method patterns so any body matches.
const ANY_BODY = "{ $__body$; }";

// `ts.SyntaxKind[kind]` yields marker aliases such as `FirstLiteralToken`;
// keep the first real name declared for every value instead.
const KIND_NAMES: ReadonlyMap<number, string> = (() => {
  const names = new Map<number, string>();
  for (const [name, value] of Object.entries(ts.SyntaxKind)) {
    if (typeof value !== "number" || /^(First|Last)/.test(name) || name === "Count") {
      continue;
    }
    if (!names.has(value)) {
      names.set(value, name);
    }
  }
  return names;
})();

const EXPRESSION_KINDS: ReadonlySet<ts.SyntaxKind> = new Set([
  ts.SyntaxKind.StringLiteral,
  ts.SyntaxKind.NumericLiteral,
  ts.SyntaxKind.BigIntLiteral,
  ts.SyntaxKind.NoSubstitutionTemplateLiteral,
  ts.SyntaxKind.TemplateExpression,
  ts.SyntaxKind.RegularExpressionLiteral,
  ts.SyntaxKind.TrueKeyword,
  ts.SyntaxKind.FalseKeyword,
  ts.SyntaxKind.NullKeyword,
  ts.SyntaxKind.ThisKeyword,
  ts.SyntaxKind.SuperKeyword,
  ts.SyntaxKind.ArrayLiteralExpression,
  ts.SyntaxKind.ObjectLiteralExpression,
  ts.SyntaxKind.PropertyAccessExpression,
  ts.SyntaxKind.ElementAccessExpression,
  ts.SyntaxKind.CallExpression,
  ts.SyntaxKind.NewExpression,
  ts.SyntaxKind.TaggedTemplateExpression,
  ts.SyntaxKind.TypeAssertionExpression,
  ts.SyntaxKind.ParenthesizedExpression,
  ts.SyntaxKind.FunctionExpression,
  ts.SyntaxKind.ArrowFunction,
  ts.SyntaxKind.DeleteExpression,
  ts.SyntaxKind.TypeOfExpression,
  ts.SyntaxKind.VoidExpression,
  ts.SyntaxKind.AwaitExpression,
  ts.SyntaxKind.PrefixUnaryExpression,
  ts.SyntaxKind.PostfixUnaryExpression,
  ts.SyntaxKind.BinaryExpression,
  ts.SyntaxKind.ConditionalExpression,
  ts.SyntaxKind.YieldExpression,
  ts.SyntaxKind.ClassExpression,
  ts.SyntaxKind.AsExpression,
  ts.SyntaxKind.NonNullExpression,
  ts.SyntaxKind.SatisfiesExpression,
  ts.SyntaxKind.MetaProperty,
]);

const STATEMENT_KINDS: ReadonlySet<ts.SyntaxKind> = new Set([
  ts.SyntaxKind.Block,
  ts.SyntaxKind.VariableStatement,
  ts.SyntaxKind.EmptyStatement,
  ts.SyntaxKind.ExpressionStatement,
  ts.SyntaxKind.IfStatement,
  ts.SyntaxKind.DoStatement,
  ts.SyntaxKind.WhileStatement,
  ts.SyntaxKind.ForStatement,
  ts.SyntaxKind.ForInStatement,
  ts.SyntaxKind.ForOfStatement,
  ts.SyntaxKind.ContinueStatement,
  ts.SyntaxKind.BreakStatement,
  ts.SyntaxKind.ReturnStatement,
  ts.SyntaxKind.WithStatement,
  ts.SyntaxKind.SwitchStatement,
  ts.SyntaxKind.LabeledStatement,
  ts.SyntaxKind.ThrowStatement,
  ts.SyntaxKind.TryStatement,
  ts.SyntaxKind.DebuggerStatement,
]);

const TYPE_DECLARATION_KINDS: ReadonlySet<ts.SyntaxKind> = new Set([
  ts.SyntaxKind.ClassDeclaration,
  ts.SyntaxKind.ClassExpression,
  ts.SyntaxKind.InterfaceDeclaration,
  ts.SyntaxKind.EnumDeclaration,
  ts.SyntaxKind.TypeAliasDeclaration,
]);

export function syntaxKindName(kind: ts.SyntaxKind): string {
  return KIND_NAMES.get(kind) ?? String(kind);
}

/** Syntax node backed by a TypeScript compiler node. Children are wrapped on demand. */
export class TypeScriptSyntaxNode implements SyntaxNode {
  readonly kind: string;
  readonly roles: ReadonlySet<NodeRole>;
  readonly token: string | null;
  readonly offset: number;
  readonly length: number;
  readonly parent: TypeScriptSyntaxNode | null;
  readonly declaration: DeclarationFacts | null;
  readonly tsNode: ts.Node;
  private readonly builder: TreeBuilder;
  private cachedSlots: readonly SyntaxSlot[] | null = null;

  constructor(tsNode: ts.Node, parent: TypeScriptSyntaxNode | null, builder: TreeBuilder) {
    const sourceFile = builder.sourceFile;
    this.tsNode = tsNode;
    this.parent = parent;
    this.builder = builder;
    this.kind = syntaxKindName(tsNode.kind);
    this.roles = rolesOf(tsNode);
    this.token = tokenOf(tsNode);
    this.offset = tsNode === sourceFile ? 0 : tsNode.getStart(sourceFile);
    this.length = tsNode.getEnd() - this.offset;
    this.declaration = declarationFactsOf(tsNode, sourceFile);
  }

  slots(): readonly SyntaxSlot[] {
    if (this.cachedSlots) {
      return this.cachedSlots;
    }

    const owner = this.tsNode;
    const slots: SyntaxSlot[] = [];
    ts.forEachChild(
      withAbsentChildren(owner),
      (child) => {
        slots.push({ kind: "node", node: child === ABSENT_CHILD ? null : this.builder.wrap(child) });
      },
      (children) => {
        if (children === ABSENT_CHILD) {
          slots.push({ kind: "node", node: null });
          return;
        }
        slots.push({
          kind: "list",
          listKind: isStatementList(owner, children) ? "statements" : "elements",
          nodes: children.map((child) => this.builder.wrap(child)),
        });
      },
    );
    this.cachedSlots = slots;
    return slots;
  }
}

const ABSENT_CHILD: object = Object.freeze({});

// `forEachChild` skips children that are not there. Reading the node through
// this view hands every unset property to the visitor as `ABSENT_CHILD`, so each
// child role keeps a fixed slot position.
function withAbsentChildren(node: ts.Node): ts.Node {
  return new Proxy(node, {
    get(target, property) {
      const value: unknown = Reflect.get(target, property, target);
      return value === undefined && typeof property === "string" ? ABSENT_CHILD : value;
    },
  });
}

class TreeBuilder {
  readonly sourceFile: ts.SourceFile;
  private readonly cache = new Map<ts.Node, TypeScriptSyntaxNode>();

  constructor(sourceFile: ts.SourceFile) {
    this.sourceFile = sourceFile;
  }

  wrap(node: ts.Node): TypeScriptSyntaxNode {
    const cached = this.cache.get(node);
    if (cached) {
      return cached;
    }

    const parent = node !== this.sourceFile && node.parent ? this.wrap(node.parent) : null;
    const wrapped = new TypeScriptSyntaxNode(node, parent, this);
    this.cache.set(node, wrapped);
    return wrapped;
  }
}

export type ParseTypeScriptOptions = {
  /** Reuse a source file owned by a `ts.Program` so a type checker can resolve its nodes. */
  sourceFile?: ts.SourceFile;
};

export function parseTypeScript(
  fileName: string,
  text: string,
  options: ParseTypeScriptOptions = {},
): SyntaxTree {
  const sourceFile =
    options.sourceFile ??
    ts.createSourceFile(fileName, text, ts.ScriptTarget.Latest, true, scriptKindFor(fileName));
  const builder = new TreeBuilder(sourceFile);
  return { fileName, text: sourceFile.text, root: builder.wrap(sourceFile) };
}

export function parseTypeScriptPattern(text: string, kind: PatternKind): PatternTree {
  const snippet = wrapPatternText(text, kind);
  const diagnostics =
    ts.transpileModule(snippet, {
      fileName: PATTERN_FILE_NAME,
      reportDiagnostics: true,
      compilerOptions: { target: ts.ScriptTarget.Latest },
    }).diagnostics ?? [];
  const firstError = diagnostics.find(
    (diagnostic) => diagnostic.category === ts.DiagnosticCategory.Error,
  );
  if (firstError) {
    throw new PatternCompileError(text, ts.flattenDiagnosticMessageText(firstError.messageText, " "));
  }

  const sourceFile = ts.createSourceFile(
    PATTERN_FILE_NAME,
    snippet,
    ts.ScriptTarget.Latest,
    true,
    ts.ScriptKind.TS,
  );
  const located = locatePatternNodes(sourceFile, kind);
  if (typeof located === "string") {
    throw new PatternCompileError(text, located);
  }

  const builder = new TreeBuilder(sourceFile);
  return {
    tree: { fileName: PATTERN_FILE_NAME, text: snippet, root: builder.wrap(sourceFile) },
    nodes: located.map((node) => builder.wrap(node)),
  };
}

/**
 * Placeholders are identifiers spelled `$name` or `$name$`. A statement or
 * type reference consisting of nothing but a placeholder stands for the
 * placeholder itself, and so does a parameter holding only a variadic one.
 */
export function placeholderNameOf(node: SyntaxNode): string | null {
  if (node.kind === "Identifier") {
    return node.token !== null && isPlaceholderName(node.token) ? node.token : null;
  }
  if (node.kind !== "ExpressionStatement" && node.kind !== "TypeReference" && node.kind !== "Parameter") {
    return null;
  }

  const present = node.slots().filter((slot) => slot.kind === "list" || slot.node !== null);
  const only = present[0];
  if (present.length !== 1 || !only || only.kind !== "node" || !only.node) {
    return null;
  }
  if (only.node.kind !== "Identifier") {
    return null;
  }
  const name = placeholderNameOf(only.node);
  // A scalar parameter binds its name identifier, so uses in the body compare equal.
  if (node.kind === "Parameter" && name !== null && !isVariadicPlaceholder(name)) {
    return null;
  }
  return name;
}

export const typescriptLanguage: SyntaxLanguage = {
  name: "typescript",
  parse: (fileName, text) => parseTypeScript(fileName, text),
  parsePattern: parseTypeScriptPattern,
  placeholderName: placeholderNameOf,
};

/** The compiler node behind `node`, when it came from this adapter. */
export function toTypeScriptNode(node: SyntaxNode): ts.Node | null {
  return node instanceof TypeScriptSyntaxNode ? node.tsNode : null;
}

function wrapPatternText(text: string, kind: PatternKind): string {
  switch (kind) {
    case "EXPRESSION":
    case "METHOD_CALL":
    case "CONSTRUCTOR":
      return `(\n${text}\n);`;
    case "STATEMENT":
    case "STATEMENT_SEQUENCE":
      return `function ${PATTERN_FUNCTION}() {\n${text}\n}`;
    case "BLOCK":
      return `function ${PATTERN_FUNCTION}() ${text}`;
    case "ANNOTATION":
      return `${text}\nclass ${PATTERN_CLASS} {}`;
    case "IMPORT":
      return text.trimEnd().endsWith(";") ? text : `${text};`;
    case "FIELD":
      return `class ${PATTERN_CLASS} {\n${text}\n}`;
    case "METHOD_DECLARATION": {
      const trimmed = text.trimEnd();
      const method = trimmed.endsWith("}") ? trimmed : `${trimmed.replace(/;$/, "")} ${ANY_BODY}`;
      return `class ${PATTERN_CLASS} {\n${method}\n}`;
    }
  }
}

function locatePatternNodes(sourceFile: ts.SourceFile, kind: PatternKind): ts.Node[] | string {
  const statements = sourceFile.statements;
  const first = statements[0];
  if (statements.length !== 1 || !first) {
    return "expected exactly one top-level construct";
  }

  switch (kind) {
    case "EXPRESSION":
    case "METHOD_CALL":
    case "CONSTRUCTOR": {
      if (!ts.isExpressionStatement(first) || !ts.isParenthesizedExpression(first.expression)) {
        return "expected an expression";
      }
      const expression = first.expression.expression;
      if (kind === "METHOD_CALL" && !ts.isCallExpression(expression)) {
        return "expected a method call";
      }
      if (kind === "CONSTRUCTOR" && !ts.isNewExpression(expression)) {
        return "expected a constructor call";
      }
      return [expression];
    }
    case "STATEMENT":
    case "STATEMENT_SEQUENCE":
    case "BLOCK": {
      if (!ts.isFunctionDeclaration(first) || !first.body) {
        return "expected statements";
      }
      if (kind === "BLOCK") {
        return [first.body];
      }
      const body = [...first.body.statements];
      if (body.length === 0) {
        return "expected at least one statement";
      }
      if (kind === "STATEMENT" && body.length !== 1) {
        return "expected a single statement";
      }
      return body;
    }
    case "ANNOTATION": {
      const decorators = ts.isClassDeclaration(first) ? ts.getDecorators(first) ?? [] : [];
      const decorator = decorators[0];
      if (decorators.length !== 1 || !decorator) {
        return "expected a single decorator";
      }
      return [decorator];
    }
    case "IMPORT":
      if (!ts.isImportDeclaration(first) && !ts.isImportEqualsDeclaration(first)) {
        return "expected an import declaration";
      }
      return [first];
    case "FIELD":
    case "METHOD_DECLARATION": {
      const members = ts.isClassDeclaration(first) ? first.members : undefined;
      const member = members?.[0];
      if (!members || members.length !== 1 || !member) {
        return "expected a single class member";
      }
      if (kind === "FIELD" && !ts.isPropertyDeclaration(member)) {
        return "expected a field declaration";
      }
      if (kind === "METHOD_DECLARATION" && !isMethodLike(member)) {
        return "expected a method declaration";
      }
      return [member];
    }
  }
}

function scriptKindFor(fileName: string): ts.ScriptKind {
  const lower = fileName.toLowerCase();
  if (lower.endsWith(".tsx")) return ts.ScriptKind.TSX;
  if (lower.endsWith(".jsx")) return ts.ScriptKind.JSX;
  if (lower.endsWith(".js") || lower.endsWith(".mjs") || lower.endsWith(".cjs")) {
    return ts.ScriptKind.JS;
  }
  return ts.ScriptKind.TS;
}

function isStatementList(owner: ts.Node, children: ts.NodeArray<ts.Node>): boolean {
  if (
    ts.isBlock(owner) ||
    ts.isSourceFile(owner) ||
    ts.isModuleBlock(owner) ||
    ts.isCaseClause(owner) ||
    ts.isDefaultClause(owner)
  ) {
    return owner.statements === children;
  }
  return false;
}

function isMethodLike(node: ts.Node): boolean {
  return (
    ts.isMethodDeclaration(node) ||
    ts.isConstructorDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node)
  );
}

function rolesOf(node: ts.Node): Set<NodeRole> {
  const roles = new Set<NodeRole>();

  if (ts.isIdentifier(node)) {
    roles.add("identifier");
    if (isValueIdentifier(node)) {
      roles.add("expression");
    }
  } else if (EXPRESSION_KINDS.has(node.kind)) {
    roles.add("expression");
  }

  if (STATEMENT_KINDS.has(node.kind)) roles.add("statement");
  if (ts.isBlock(node)) roles.add("block");
  if (ts.isCallExpression(node)) roles.add("method-call");
  if (ts.isNewExpression(node)) roles.add("constructor-call");
  if (ts.isDecorator(node)) roles.add("annotation");
  if (ts.isImportDeclaration(node) || ts.isImportEqualsDeclaration(node)) roles.add("import");
  if (ts.isPropertyDeclaration(node)) roles.add("field");
  if (isMethodLike(node)) roles.add("method-declaration");
  if (TYPE_DECLARATION_KINDS.has(node.kind)) roles.add("type-declaration");

  if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) {
    roles.add("literal");
    roles.add("string-literal");
  } else if (ts.isNumericLiteral(node) || ts.isBigIntLiteral(node)) {
    roles.add("literal");
    roles.add("number-literal");
  } else if (
    node.kind === ts.SyntaxKind.TrueKeyword ||
    node.kind === ts.SyntaxKind.FalseKeyword ||
    node.kind === ts.SyntaxKind.NullKeyword ||
    ts.isRegularExpressionLiteral(node)
  ) {
    roles.add("literal");
  }

  if (hasDirectSideEffect(node)) {
    roles.add("side-effect");
  }
  return roles;
}

function isValueIdentifier(node: ts.Identifier): boolean {
  const parent = node.parent;
  if (!parent) {
    return true;
  }
  if (ts.isPropertyAccessExpression(parent)) {
    return parent.expression === node;
  }
  if (ts.isQualifiedName(parent) || ts.isTypeReferenceNode(parent)) {
    return false;
  }
  if ("name" in parent && parent.name === node) {
    return false;
  }
  return true;
}

function hasDirectSideEffect(node: ts.Node): boolean {
  if (
    ts.isCallExpression(node) ||
    ts.isNewExpression(node) ||
    ts.isTaggedTemplateExpression(node) ||
    ts.isDeleteExpression(node) ||
    ts.isAwaitExpression(node) ||
    ts.isYieldExpression(node)
  ) {
    return true;
  }
  if (ts.isBinaryExpression(node)) {
    const operator = node.operatorToken.kind;
    return operator >= ts.SyntaxKind.FirstAssignment && operator <= ts.SyntaxKind.LastAssignment;
  }
  if (ts.isPrefixUnaryExpression(node) || ts.isPostfixUnaryExpression(node)) {
    return (
      node.operator === ts.SyntaxKind.PlusPlusToken ||
      node.operator === ts.SyntaxKind.MinusMinusToken
    );
  }
  return false;
}

function tokenOf(node: ts.Node): string | null {
  if (ts.isIdentifier(node) || ts.isPrivateIdentifier(node)) {
    return node.text;
  }
  if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) {
    return JSON.stringify(node.text);
  }
  if (
    ts.isNumericLiteral(node) ||
    ts.isBigIntLiteral(node) ||
    ts.isRegularExpressionLiteral(node) ||
    ts.isTemplateHead(node) ||
    ts.isTemplateMiddle(node) ||
    ts.isTemplateTail(node)
  ) {
    return node.text;
  }
  if (ts.isPrefixUnaryExpression(node) || ts.isPostfixUnaryExpression(node)) {
    return ts.tokenToString(node.operator) ?? null;
  }
  if (ts.isVariableDeclarationList(node)) {
    return variableKeyword(node);
  }
  if (ts.isHeritageClause(node)) {
    return ts.tokenToString(node.token) ?? null;
  }
  if (ts.isTypeOperatorNode(node)) {
    return ts.tokenToString(node.operator) ?? null;
  }
  if (ts.isMetaProperty(node)) {
    return ts.tokenToString(node.keywordToken) ?? null;
  }
  if (ts.isImportClause(node)) {
    return node.isTypeOnly ? "type" : null;
  }
  return null;
}

function variableKeyword(list: ts.VariableDeclarationList): string {
  if (list.flags & ts.NodeFlags.Const) return "const";
  if (list.flags & ts.NodeFlags.Let) return "let";
  return "var";
}

type DeclarationNode =
  | ts.PropertyDeclaration
  | ts.PropertySignature
  | ts.MethodDeclaration
  | ts.MethodSignature
  | ts.ConstructorDeclaration
  | ts.GetAccessorDeclaration
  | ts.SetAccessorDeclaration
  | ts.VariableDeclaration
  | ts.ParameterDeclaration
  | ts.ClassDeclaration
  | ts.ClassExpression
  | ts.InterfaceDeclaration
  | ts.EnumDeclaration
  | ts.TypeAliasDeclaration
  | ts.FunctionDeclaration;

function elementKindOf(node: ts.Node): { node: DeclarationNode; kind: ElementKind } | null {
  if (ts.isPropertyDeclaration(node) || ts.isPropertySignature(node)) {
    return { node, kind: "FIELD" };
  }
  if (
    ts.isMethodDeclaration(node) ||
    ts.isMethodSignature(node) ||
    ts.isConstructorDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node)
  ) {
    return { node, kind: "METHOD" };
  }
  if (ts.isVariableDeclaration(node)) return { node, kind: "LOCAL_VARIABLE" };
  if (ts.isParameter(node)) return { node, kind: "PARAMETER" };
  if (
    ts.isClassDeclaration(node) ||
    ts.isClassExpression(node) ||
    ts.isInterfaceDeclaration(node) ||
    ts.isEnumDeclaration(node) ||
    ts.isTypeAliasDeclaration(node)
  ) {
    return { node, kind: "TYPE" };
  }
  if (ts.isFunctionDeclaration(node)) return { node, kind: "FUNCTION" };
  return null;
}

/** Declaration facts of a compiler node; also used for declarations found by the checker. */
export function declarationFactsOf(
  node: ts.Node,
  sourceFile: ts.SourceFile,
): DeclarationFacts | null {
  const element = elementKindOf(node);
  if (!element) {
    return null;
  }

  const modifiers = (ts.canHaveModifiers(node) ? ts.getModifiers(node) ?? [] : [])
    .map((modifier) => ts.tokenToString(modifier.kind))
    .filter((keyword): keyword is string => keyword !== undefined);
  if (ts.isVariableDeclaration(node) && ts.isVariableDeclarationList(node.parent)) {
    modifiers.push(variableKeyword(node.parent));
  }

  const annotations = (ts.canHaveDecorators(node) ? ts.getDecorators(node) ?? [] : []).map(
    (decorator) => decoratorName(decorator, sourceFile),
  );

  return {
    name: declaredName(element.node, sourceFile),
    elementKind: element.kind,
    modifiers,
    annotations,
  };
}

function declaredName(node: DeclarationNode, sourceFile: ts.SourceFile): string | null {
  if (ts.isConstructorDeclaration(node)) {
    return "constructor";
  }
  const name = ts.getNameOfDeclaration(node);
  if (!name) {
    return null;
  }
  return ts.isIdentifier(name) || ts.isPrivateIdentifier(name) ? name.text : name.getText(sourceFile);
}

function decoratorName(decorator: ts.Decorator, sourceFile: ts.SourceFile): string {
  const expression = ts.isCallExpression(decorator.expression)
    ? decorator.expression.expression
    : decorator.expression;
  if (ts.isIdentifier(expression)) {
    return expression.text;
  }
  if (ts.isPropertyAccessExpression(expression)) {
    return expression.name.text;
  }
  return expression.getText(sourceFile);
}
