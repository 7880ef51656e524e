/**
 * Rendering of synthesized expressions and resolved types as TypeScript
 * source text
 */

import { Expression, Pattern, ResolvedType } from "./types";
import { formatQualifiedName } from "./utils";

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Name of the runtime helper that `case` expressions render to
 */
export const MATCH_HELPER = "match";

export function renderExpression(expression: Expression): string {
  switch (expression.kind) {
    case "ref":
      return formatQualifiedName(expression.ref);
    case "var":
      return expression.name;
    case "literal":
      return expression.value === null ? "null" : typeof expression.value === "string" ? JSON.stringify(expression.value) : String(expression.value);
    case "lambda":
      return `(${expression.params.map(renderPattern).join(", ")}) => ${renderArrowBody(expression.body)}`;
    case "apply":
      return `${renderCallee(expression.fn)}(${expression.args.map(renderExpression).join(", ")})`;
    case "record":
      if (expression.fields.length === 0) return "{}";
      return `{ ${expression.fields.map((field) => `${renderKey(field.name)}: ${renderExpression(field.value)}`).join(", ")} }`;
    case "tuple":
    case "list":
      return `[${expression.elements.map(renderExpression).join(", ")}]`;
    case "access":
      return `${renderCallee(expression.target)}.${expression.field}`;
    case "case": {
      const handlers = expression.branches.map((branch) => {
        const pattern = branch.pattern;
        if (pattern.kind === "constructor") {
          return `${renderKey(pattern.ref.name)}: (${renderPattern(pattern)}) => ${renderArrowBody(branch.body)}`;
        }
        const params = pattern.kind === "wildcard" ? "" : renderPattern(pattern);
        return `_: (${params}) => ${renderArrowBody(branch.body)}`;
      });
      return `${MATCH_HELPER}(${renderExpression(expression.scrutinee)}, { ${handlers.join(", ")} })`;
    }
  }
}

function renderArrowBody(body: Expression): string {
  const text = renderExpression(body);
  return body.kind === "record" ? `(${text})` : text;
}

function renderCallee(callee: Expression): string {
  const text = renderExpression(callee);
  switch (callee.kind) {
    case "ref":
    case "var":
    case "apply":
    case "access":
    case "case":
      return text;
    default:
      return `(${text})`;
  }
}

function renderKey(name: string): string {
  return IDENTIFIER.test(name) ? name : JSON.stringify(name);
}

/**
 * Patterns in parameter position. A constructor pattern destructures the
 * runtime `{ tag, args }` representation.
 */
export function renderPattern(pattern: Pattern): string {
  switch (pattern.kind) {
    case "var":
      return pattern.name;
    case "wildcard":
      return "_";
    case "tuple":
      return `[${pattern.elements.map(renderPattern).join(", ")}]`;
    case "record":
      return pattern.fields.length === 0 ? "{}" : `{ ${pattern.fields.join(", ")} }`;
    case "constructor":
      return `{ args: [${pattern.args.map(renderPattern).join(", ")}] }`;
  }
}

export type TypeNameRenderer = (args: string[]) => string;

export const DEFAULT_TYPE_NAMES: Record<string, TypeNameRenderer> = {
  "Basics.Int": () => "number",
  "Basics.Float": () => "number",
  "Basics.Bool": () => "boolean",
  "Basics.Unit": () => "undefined",
  "String.String": () => "string",
  "Char.Char": () => "string",
  "List.List": ([element]) => `Array<${element}>`,
  "Array.Array": ([element]) => `Array<${element}>`,
  "Set.Set": ([element]) => `Set<${element}>`,
  "Maybe.Maybe": ([value]) => `${value} | undefined`,
  "Dict.Dict": ([key, value]) => `Map<${key}, ${value}>`,
  "Result.Result": ([error, value]) => `{ ok: true; value: ${value} } | { ok: false; error: ${error} }`,
};

export function renderType(
  type: ResolvedType,
  typeNames: Record<string, TypeNameRenderer> = DEFAULT_TYPE_NAMES
): string {
  const render = (inner: ResolvedType) => renderType(inner, typeNames);

  switch (type.kind) {
    case "opaque": {
      const name = formatQualifiedName(type.ref);
      const args = type.args.map(render);
      const known = typeNames[name];
      if (known) return known(args);
      return args.length === 0 ? name : `${name}<${args.join(", ")}>`;
    }
    case "customType":
    case "typeAlias":
      return formatQualifiedName(type.ref);
    case "anonymousRecord":
      if (type.fields.length === 0) return "{}";
      return `{ ${type.fields.map((field) => `${renderKey(field.name)}: ${render(field.type)}`).join("; ")} }`;
    case "tuple":
      return type.elements.length === 0 ? "undefined" : `[${type.elements.map(render).join(", ")}]`;
    case "function":
      return `(value: ${render(type.from)}) => ${render(type.to)}`;
    case "typeVariable":
      return type.name;
  }
}
