/**
 * Recursion handling
 * Auxiliary declarations that reach themselves through eager references
 * get those references wrapped by the generator's lambda-breaker
 */

import { AuxiliaryDeclaration, Expression, LambdaBreaker } from "./types";
import { GenerationError } from "./composer";
import { mapChildren } from "./expression";

/**
 * Names of declarations referenced anywhere in `expression`
 */
function referencedDeclarations(expression: Expression, names: ReadonlySet<string>): Set<string> {
  const found = new Set<string>();
  const visit = (expr: Expression): Expression => {
    if (expr.kind === "ref" && expr.ref.modulePath.length === 0 && names.has(expr.ref.name)) {
      found.add(expr.ref.name);
    }
    return mapChildren(expr, visit);
  };
  visit(expression);
  return found;
}

function reachable(from: string, graph: ReadonlyMap<string, Set<string>>): Set<string> {
  const seen = new Set<string>();
  const stack = [...(graph.get(from) ?? [])];
  while (stack.length > 0) {
    const next = stack.pop();
    if (next === undefined || seen.has(next)) continue;
    seen.add(next);
    stack.push(...(graph.get(next) ?? []));
  }
  return seen;
}

export function breakRecursion(
  declarations: AuxiliaryDeclaration[],
  lambdaBreaker: LambdaBreaker | undefined,
  generatorId: string
): AuxiliaryDeclaration[] {
  const names = new Set(declarations.map((declaration) => declaration.name));
  const graph = new Map(
    declarations.map((declaration) => [declaration.name, referencedDeclarations(declaration.body, names)])
  );
  const reach = new Map([...names].map((name) => [name, reachable(name, graph)]));

  return declarations.map((declaration) => {
    // Declarations on a cycle through this one, itself included when recursive
    const cyclic = new Set([...(graph.get(declaration.name) ?? [])].filter((other) => reach.get(other)?.has(declaration.name)));
    if (cyclic.size === 0) {
      return declaration;
    }

    const rewrite = (expression: Expression): Expression => {
      if (expression.kind === "lambda") {
        return expression;
      }
      if (expression.kind === "ref" && expression.ref.modulePath.length === 0 && cyclic.has(expression.ref.name)) {
        if (!lambdaBreaker) {
          throw new GenerationError(
            `${generatorId} cannot derive the recursive type behind ${declaration.name} without a lambda breaker`
          );
        }
        return lambdaBreaker(expression);
      }
      return mapChildren(expression, rewrite);
    };

    return { ...declaration, body: rewrite(declaration.body) };
  });
}
