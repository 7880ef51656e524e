/**
 * Module emission with ts-morph
 * Turns derived declarations into an importable TypeScript module
 */

import { Project, SourceFile, VariableDeclarationKind } from "ts-morph";
import { EmittedDeclaration, Expression, ResolvedType } from "./types";
import { DEFAULT_TYPE_NAMES, MATCH_HELPER, TypeNameRenderer, renderExpression, renderPattern, renderType } from "./render";
import { mapChildren } from "./expression";
import { formatQualifiedName } from "./utils";
import { DEFAULT_RUNTIME_MODULE } from "./config";

export type EmitOptions = {
  /** Import specifier for each module root, e.g. `{ Shapes: "./shapes" }` */
  imports?: Record<string, string>;
  runtimeModule?: string;
  typeNames?: Record<string, TypeNameRenderer>;
};

export class EmitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EmitError";
  }
}

export const DEFAULT_IMPORTS: Record<string, string> = { fc: "fast-check" };

/** Value roots exported by the runtime module */
export const RUNTIME_VALUES = ["Tuple", "Collections", "Json"];

/** Types exported by the runtime module, by the qualified name they stand for */
export const RUNTIME_TYPES: Record<string, string> = { "Json.Value": "JsonValue" };

/** Roots resolved by the JavaScript environment */
export const GLOBAL_ROOTS = ["Array", "Object", "Math", "JSON", "Number"];

type ModuleUsage = {
  roots: Set<string>;
  runtimeTypes: Set<string>;
  usesMatch: boolean;
};

function collectExpression(expression: Expression, usage: ModuleUsage): void {
  const visit = (expr: Expression): Expression => {
    if (expr.kind === "ref" && expr.ref.modulePath.length > 0) {
      usage.roots.add(expr.ref.modulePath[0]);
    } else if (expr.kind === "case") {
      usage.usesMatch = true;
    }
    return mapChildren(expr, visit);
  };
  visit(expression);
}

/**
 * Named types stop the walk, so cyclic graphs terminate
 */
function collectType(type: ResolvedType, typeNames: Record<string, TypeNameRenderer>, usage: ModuleUsage): void {
  switch (type.kind) {
    case "opaque": {
      const name = formatQualifiedName(type.ref);
      const runtimeType = RUNTIME_TYPES[name];
      if (runtimeType !== undefined) {
        usage.runtimeTypes.add(runtimeType);
      } else if (typeNames[name] === undefined && type.ref.modulePath.length > 0) {
        usage.roots.add(type.ref.modulePath[0]);
      }
      type.args.forEach((arg) => collectType(arg, typeNames, usage));
      break;
    }
    case "customType":
    case "typeAlias":
      if (type.ref.modulePath.length > 0) usage.roots.add(type.ref.modulePath[0]);
      break;
    case "anonymousRecord":
      type.fields.forEach((field) => collectType(field.type, typeNames, usage));
      break;
    case "tuple":
      type.elements.forEach((element) => collectType(element, typeNames, usage));
      break;
    case "function":
      collectType(type.from, typeNames, usage);
      collectType(type.to, typeNames, usage);
      break;
    case "typeVariable":
      break;
  }
}

/**
 * Split a function type into one parameter type per declared parameter and
 * the remaining result type
 */
function peelParameters(declaration: EmittedDeclaration): { parameterTypes: ResolvedType[]; returnType: ResolvedType } {
  const parameterTypes: ResolvedType[] = [];
  let current = declaration.type;
  for (let index = 0; index < declaration.params.length; index += 1) {
    if (current.kind !== "function") {
      throw new EmitError(`${declaration.name} has more parameters than its type has arguments`);
    }
    parameterTypes.push(current.from);
    current = current.to;
  }
  return { parameterTypes, returnType: current };
}

/**
 * Write `declarations`, in order, to a new source file at `filePath`
 */
export function emitModule(
  project: Project,
  filePath: string,
  declarations: EmittedDeclaration[],
  options: EmitOptions = {}
): SourceFile {
  const runtimeTypeNames: Record<string, TypeNameRenderer> = Object.fromEntries(
    Object.entries(RUNTIME_TYPES).map(([name, exported]) => [name, () => exported])
  );
  const typeNames = { ...DEFAULT_TYPE_NAMES, ...runtimeTypeNames, ...options.typeNames };
  const imports = { ...DEFAULT_IMPORTS, ...options.imports };
  const runtimeModule = options.runtimeModule ?? DEFAULT_RUNTIME_MODULE;

  const usage: ModuleUsage = { roots: new Set(), runtimeTypes: new Set(), usesMatch: false };
  for (const declaration of declarations) {
    collectExpression(declaration.body, usage);
    collectType(declaration.type, typeNames, usage);
  }

  const sourceFile = project.createSourceFile(filePath, "", { overwrite: true });

  const runtimeValues = RUNTIME_VALUES.filter((name) => usage.roots.has(name));
  if (usage.usesMatch) runtimeValues.unshift(MATCH_HELPER);
  if (runtimeValues.length > 0) {
    sourceFile.addImportDeclaration({ moduleSpecifier: runtimeModule, namedImports: runtimeValues });
  }
  if (usage.runtimeTypes.size > 0) {
    sourceFile.addImportDeclaration({
      isTypeOnly: true,
      moduleSpecifier: runtimeModule,
      namedImports: [...usage.runtimeTypes].sort(),
    });
  }

  const namespaces = [...usage.roots]
    .filter((root) => !RUNTIME_VALUES.includes(root) && !GLOBAL_ROOTS.includes(root))
    .sort();
  for (const root of namespaces) {
    sourceFile.addImportDeclaration({ moduleSpecifier: imports[root] ?? `./${root}`, namespaceImport: root });
  }

  for (const declaration of declarations) {
    if (declaration.params.length === 0) {
      sourceFile.addVariableStatement({
        isExported: true,
        declarationKind: VariableDeclarationKind.Const,
        declarations: [
          {
            name: declaration.name,
            type: renderType(declaration.type, typeNames),
            initializer: renderExpression(declaration.body),
          },
        ],
      });
      continue;
    }

    const { parameterTypes, returnType } = peelParameters(declaration);
    sourceFile.addFunction({
      isExported: true,
      name: declaration.name,
      parameters: declaration.params.map((param, index) => ({
        name: renderPattern(param),
        type: renderType(parameterTypes[index], typeNames),
      })),
      returnType: renderType(returnType, typeNames),
      statements: [`return ${renderExpression(declaration.body)};`],
    });
  }

  return sourceFile;
}
