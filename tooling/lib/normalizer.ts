/**
 * Declaration normalizer
 * Moves a lambda body's parameters into the declaration's own parameter list
 */

import { Declaration, Expression } from "./types";
import { local, substitute } from "./expression";

export function normalizeDeclaration(declaration: Declaration): Declaration {
  const { body, params } = declaration;
  if (body.kind !== "lambda") {
    return declaration;
  }

  if (params.length === 0) {
    return { ...declaration, params: body.params, body: body.body };
  }

  if (params.length !== body.params.length) {
    return declaration;
  }

  const renames = new Map<string, Expression>();
  for (let index = 0; index < params.length; index += 1) {
    const formal = params[index];
    const inner = body.params[index];
    if (formal.kind !== "var" || inner.kind !== "var") {
      return declaration;
    }
    renames.set(inner.name, local(formal.name));
  }

  return { ...declaration, body: substitute(body.body, renames) };
}
