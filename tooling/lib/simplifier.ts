/**
 * Expression simplifier
 * One bottom-up pass of beta and eta reduction over synthesized code
 */

import { Expression, Pattern } from "./types";
import { freeVariables, mapChildren, patternNames, substitute } from "./expression";

export function simplify(expression: Expression): Expression {
  const simplified = mapChildren(expression, simplify);

  switch (simplified.kind) {
    case "apply":
      return betaReduce(simplified) ?? simplified;
    case "lambda":
      return etaReduce(simplified) ?? simplified;
    default:
      return simplified;
  }
}

function simpleNames(params: Pattern[]): string[] | undefined {
  const names: string[] = [];
  for (const param of params) {
    if (param.kind !== "var") return undefined;
    names.push(param.name);
  }
  return names;
}

/**
 * `((a, b) => body)(x, y)` becomes `body[a := x, b := y]`
 */
function betaReduce(expression: Extract<Expression, { kind: "apply" }>): Expression | undefined {
  const fn = expression.fn;
  if (fn.kind !== "lambda" || fn.params.length !== expression.args.length) {
    return undefined;
  }

  const names = simpleNames(fn.params);
  if (!names) {
    return undefined;
  }

  const replacements = new Map<string, Expression>();
  names.forEach((name, index) => replacements.set(name, expression.args[index]));
  // Substitution can expose new redexes
  return simplify(substitute(fn.body, replacements));
}

/**
 * `(a, b) => f(a, b)` becomes `f` when `f` does not use `a` or `b`;
 * a partial match drops only the matched trailing parameters
 */
function etaReduce(expression: Extract<Expression, { kind: "lambda" }>): Expression | undefined {
  const body = expression.body;
  if (body.kind !== "apply") {
    return undefined;
  }

  const { params } = expression;
  const { fn, args } = body;
  let matched = 0;
  while (matched < params.length && matched < args.length) {
    const param = params[params.length - 1 - matched];
    const arg = args[args.length - 1 - matched];
    if (param.kind !== "var" || arg.kind !== "var" || param.name !== arg.name) break;
    matched += 1;
  }

  // Dropped names must not be used by the callee, the kept arguments or
  // another parameter
  while (matched > 0) {
    const kept = params.slice(0, params.length - matched);
    const dropped = new Set(params.slice(params.length - matched).flatMap(patternNames));
    const uses = [fn, ...args.slice(0, args.length - matched)].flatMap((part) => [...freeVariables(part)]);
    const rebinds = kept.flatMap(patternNames);
    if (![...uses, ...rebinds].some((name) => dropped.has(name))) {
      break;
    }
    matched -= 1;
  }

  if (matched === 0) {
    return undefined;
  }

  const remainingParams = params.slice(0, params.length - matched);
  const remainingArgs = args.slice(0, args.length - matched);
  const reducedBody: Expression = remainingArgs.length === 0 ? fn : { kind: "apply", fn, args: remainingArgs };

  // Dropping parameters can expose a new redex
  return simplify(remainingParams.length === 0 ? reducedBody : { kind: "lambda", params: remainingParams, body: reducedBody });
}
