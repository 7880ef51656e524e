/**
 * Expression constructors and traversal helpers
 */

import { CaseBranch, Expression, LiteralValue, Pattern, QualifiedName } from "./types";
import { qualifiedName } from "./utils";

export function ref(modulePath: string[] | string, name: string): Expression {
  return { kind: "ref", ref: qualifiedName(modulePath, name) };
}

export function refTo(name: QualifiedName): Expression {
  return { kind: "ref", ref: name };
}

export function local(name: string): Expression {
  return { kind: "var", name };
}

export function literal(value: LiteralValue): Expression {
  return { kind: "literal", value };
}

export function lambda(params: (Pattern | string)[], body: Expression): Expression {
  return { kind: "lambda", params: params.map(toPattern), body };
}

export function apply(fn: Expression, args: Expression[]): Expression {
  return { kind: "apply", fn, args };
}

export function record(fields: [string, Expression][]): Expression {
  return { kind: "record", fields: fields.map(([name, value]) => ({ name, value })) };
}

export function tuple(elements: Expression[]): Expression {
  return { kind: "tuple", elements };
}

export function list(elements: Expression[]): Expression {
  return { kind: "list", elements };
}

export function access(target: Expression, field: string): Expression {
  return { kind: "access", target, field };
}

export function caseOf(scrutinee: Expression, branches: CaseBranch[]): Expression {
  return { kind: "case", scrutinee, branches };
}

/**
 * Method-call shorthand: `target.method(args)`
 */
export function invoke(target: Expression, method: string, args: Expression[]): Expression {
  return apply(access(target, method), args);
}

export function varPattern(name: string): Pattern {
  return { kind: "var", name };
}

function toPattern(param: Pattern | string): Pattern {
  return typeof param === "string" ? varPattern(param) : param;
}

export function patternNames(pattern: Pattern): string[] {
  switch (pattern.kind) {
    case "var":
      return [pattern.name];
    case "wildcard":
      return [];
    case "record":
      return [...pattern.fields];
    case "tuple":
      return pattern.elements.flatMap(patternNames);
    case "constructor":
      return pattern.args.flatMap(patternNames);
  }
}

/**
 * Local variables used but not bound within `expression`
 */
export function freeVariables(expression: Expression): Set<string> {
  const free = new Set<string>();

  function visit(expr: Expression, bound: ReadonlySet<string>): void {
    switch (expr.kind) {
      case "var":
        if (!bound.has(expr.name)) free.add(expr.name);
        break;
      case "ref":
      case "literal":
        break;
      case "lambda":
        visit(expr.body, extend(bound, expr.params.flatMap(patternNames)));
        break;
      case "apply":
        visit(expr.fn, bound);
        expr.args.forEach((arg) => visit(arg, bound));
        break;
      case "record":
        expr.fields.forEach((field) => visit(field.value, bound));
        break;
      case "tuple":
      case "list":
        expr.elements.forEach((element) => visit(element, bound));
        break;
      case "access":
        visit(expr.target, bound);
        break;
      case "case":
        visit(expr.scrutinee, bound);
        for (const branch of expr.branches) {
          visit(branch.body, extend(bound, patternNames(branch.pattern)));
        }
        break;
    }
  }

  visit(expression, new Set());
  return free;
}

function extend(bound: ReadonlySet<string>, names: string[]): ReadonlySet<string> {
  if (names.length === 0) return bound;
  const next = new Set(bound);
  names.forEach((name) => next.add(name));
  return next;
}

/**
 * Rebuild `expression` with `fn` applied to each direct child
 */
export function mapChildren(expression: Expression, fn: (child: Expression) => Expression): Expression {
  switch (expression.kind) {
    case "ref":
    case "var":
    case "literal":
      return expression;
    case "lambda":
      return { ...expression, body: fn(expression.body) };
    case "apply":
      return { ...expression, fn: fn(expression.fn), args: expression.args.map(fn) };
    case "record":
      return { ...expression, fields: expression.fields.map((field) => ({ name: field.name, value: fn(field.value) })) };
    case "tuple":
    case "list":
      return { ...expression, elements: expression.elements.map(fn) };
    case "access":
      return { ...expression, target: fn(expression.target) };
    case "case":
      return {
        ...expression,
        scrutinee: fn(expression.scrutinee),
        branches: expression.branches.map((branch) => ({ pattern: branch.pattern, body: fn(branch.body) })),
      };
  }
}

/**
 * Replace free occurrences of the given variables. Replacement stops where
 * a lambda parameter or case pattern rebinds the name.
 */
export function substitute(expression: Expression, replacements: ReadonlyMap<string, Expression>): Expression {
  if (replacements.size === 0) {
    return expression;
  }

  switch (expression.kind) {
    case "var":
      return replacements.get(expression.name) ?? expression;
    case "lambda": {
      const inner = without(replacements, expression.params.flatMap(patternNames));
      return { ...expression, body: substitute(expression.body, inner) };
    }
    case "case":
      return {
        ...expression,
        scrutinee: substitute(expression.scrutinee, replacements),
        branches: expression.branches.map((branch) => ({
          pattern: branch.pattern,
          body: substitute(branch.body, without(replacements, patternNames(branch.pattern))),
        })),
      };
    default:
      return mapChildren(expression, (child) => substitute(child, replacements));
  }
}

function without(replacements: ReadonlyMap<string, Expression>, names: string[]): ReadonlyMap<string, Expression> {
  if (!names.some((name) => replacements.has(name))) return replacements;
  const next = new Map(replacements);
  names.forEach((name) => next.delete(name));
  return next;
}
