import P from "parsimmon";
import { GuardSyntaxError } from "../errors.ts";
import { guardAnd, guardCall, guardNot, guardOr, type GuardExpression } from "./types.ts";

const whitespace = P.optWhitespace;

function lexeme<T>(parser: P.Parser<T>): P.Parser<T> {
  return parser.skip(whitespace);
}

function symbol(text: string): P.Parser<string> {
  return lexeme(P.string(text));
}

const placeholder = P.regexp(/\$[A-Za-z_][A-Za-z0-9_]*\$?/).desc("placeholder");
const identifier = P.regexp(/[A-Za-z_][A-Za-z0-9_]*/).desc("identifier");
const qualifiedName = P.regexp(/[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*(?:\[\])*/).desc(
  "type name",
);
const stringLiteral = P.regexp(/"(?:[^"\\]|\\.)*"/).desc("string");
const numberLiteral = P.regexp(/-?\d+(?:\.\d+)*/).desc("number");

const argument = lexeme(P.alt(stringLiteral, placeholder, numberLiteral, qualifiedName));
const argumentList = argument.sepBy(symbol(",")).wrap(symbol("("), symbol(")"));

const expression: P.Parser<GuardExpression> = P.lazy(() => disjunction);

// `$x instanceof T` is sugar for `instanceof($x, T)`; a bare `$x` means `matchesAny($x)`.
const placeholderTerm = P.seqMap(
  lexeme(placeholder),
  lexeme(P.string("instanceof")).then(lexeme(qualifiedName)).fallback(null),
  (name, typeName) =>
    typeName === null ? guardCall("matchesAny", [name]) : guardCall("instanceof", [name, typeName]),
);

const call = P.seqMap(lexeme(identifier), argumentList.fallback(null), (name, args) =>
  guardCall(name, args ?? []),
);

const primary: P.Parser<GuardExpression> = P.alt(
  expression.wrap(symbol("("), symbol(")")),
  placeholderTerm,
  call,
);

const unary: P.Parser<GuardExpression> = P.lazy(() =>
  P.alt(symbol("!").then(unary).map(guardNot), primary),
);

const conjunction = unary
  .sepBy1(symbol("&&"))
  .map((operands) => operands.reduce((left, right) => guardAnd(left, right)));

const disjunction: P.Parser<GuardExpression> = conjunction
  .sepBy1(symbol("||"))
  .map((operands) => operands.reduce((left, right) => guardOr(left, right)));

const guardParser = whitespace.then(expression).skip(P.eof);

/**
 * Parses guard text. `||` binds looser than `&&`, which binds looser than `!`.
 * Function names are not checked here; unknown names fail at evaluation time.
 */
export function parseGuardExpression(text: string): GuardExpression {
  const result = guardParser.parse(text);
  if (result.status) {
    return result.value;
  }

  const expected = [...new Set(result.expected)].sort().join(", ");
  throw new GuardSyntaxError(
    `Invalid guard expression "${text}": expected ${expected} at column ${result.index.column}.`,
    result.index.column,
  );
}
