/**
 * Derivation request loading
 *
 * A request is a JSON document describing the module to derive into, the
 * named types it uses, existing implementations, and the declarations to
 * derive:
 *
 *   {
 *     "module": "Shapes",
 *     "types": { "Shape": { "kind": "customType", "constructors": [...] } },
 *     "providers": [{ "generator": "arbitrary", "location": "Shapes.arbPoint", "type": ..., "scope": "module-local" }],
 *     "declarations": [{ "name": "arbShape", "annotation": ... }]
 *   }
 *
 * A type is either a dotted name (a table entry when one matches, otherwise
 * an opaque type) or an object with a `kind`.
 */

import { readFileSync } from "fs";
import { DerivationRequest, Pattern, QualifiedName, RecordField, ResolvedType } from "./types";
import { ProviderCandidate, ProviderScope, SCOPE_PRIORITY } from "./provider-selector";
import { UNIT_TYPE } from "./resolved-type";
import { varPattern } from "./expression";
import { formatQualifiedName, isPlainObject, parseQualifiedName, qualifiedName } from "./utils";

export class RequestValidationError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid derivation request:\n${problems.map((problem) => `  - ${problem}`).join("\n")}`);
    this.name = "RequestValidationError";
  }
}

export type LoadedRequest = {
  modulePath: string[];
  /** Named types by dotted qualified name */
  types: Map<string, ResolvedType>;
  providers: ProviderCandidate[];
  declarations: DerivationRequest[];
};

type CustomTypeShell = Extract<ResolvedType, { kind: "customType" }>;
type TypeAliasShell = Extract<ResolvedType, { kind: "typeAlias" }>;

function isScope(value: unknown): value is ProviderScope {
  return SCOPE_PRIORITY.some((scope) => scope === value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

class RequestReader {
  private readonly problems: string[] = [];
  private readonly types = new Map<string, ResolvedType>();
  private modulePath: string[] = [];

  read(value: unknown): LoadedRequest {
    if (!isPlainObject(value)) {
      throw new RequestValidationError(["request must be an object"]);
    }

    if (typeof value.module === "string" && value.module.length > 0) {
      this.modulePath = value.module.split(".");
    } else {
      this.problem("module", "must be a non-empty dotted module name");
    }

    this.readTypeTable(value.types);
    const providers = this.readProviders(value.providers);
    const declarations = this.readDeclarations(value.declarations);
    this.checkAliasCycles();

    if (this.problems.length > 0) {
      throw new RequestValidationError(this.problems);
    }

    return { modulePath: this.modulePath, types: this.types, providers, declarations };
  }

  private problem(path: string, message: string): void {
    this.problems.push(`${path}: ${message}`);
  }

  /**
   * Table keys without a module are qualified with the request module
   */
  private tableName(key: string): QualifiedName {
    return key.includes(".") ? parseQualifiedName(key) : qualifiedName(this.modulePath, key);
  }

  private readTypeTable(table: unknown): void {
    if (table === undefined) return;
    if (!isPlainObject(table)) {
      this.problem("types", "must be an object");
      return;
    }

    // Shells first so entries can refer to each other, themselves included
    const entries: { key: string; path: string; shell: ResolvedType; definition: Record<string, unknown> }[] = [];
    for (const [key, definition] of Object.entries(table)) {
      const path = `types.${key}`;
      if (!isPlainObject(definition)) {
        this.problem(path, "must be an object");
        continue;
      }
      const ref = this.tableName(key);
      const generics = definition.generics === undefined ? [] : definition.generics;
      if (!isStringArray(generics)) {
        this.problem(`${path}.generics`, "must be an array of strings");
        continue;
      }

      let shell: ResolvedType;
      if (definition.kind === "customType") {
        shell = { kind: "customType", ref, generics, constructors: [] };
      } else if (definition.kind === "typeAlias") {
        shell = { kind: "typeAlias", ref, generics, inner: UNIT_TYPE };
      } else {
        this.problem(`${path}.kind`, `must be "customType" or "typeAlias"`);
        continue;
      }
      this.types.set(formatQualifiedName(ref), shell);
      entries.push({ key, path, shell, definition });
    }

    for (const { path, shell, definition } of entries) {
      if (shell.kind === "customType") {
        this.fillCustomType(shell, definition, path);
      } else if (shell.kind === "typeAlias") {
        this.fillTypeAlias(shell, definition, path);
      }
    }
  }

  private fillCustomType(shell: CustomTypeShell, definition: Record<string, unknown>, path: string): void {
    const constructors = definition.constructors;
    if (!Array.isArray(constructors) || constructors.length === 0) {
      this.problem(`${path}.constructors`, "must be a non-empty array");
      return;
    }

    constructors.forEach((constructor: unknown, index) => {
      const at = `${path}.constructors[${index}]`;
      if (!isPlainObject(constructor) || typeof constructor.name !== "string") {
        this.problem(at, "must be an object with a name");
        return;
      }
      const args = constructor.args === undefined ? [] : constructor.args;
      if (!Array.isArray(args)) {
        this.problem(`${at}.args`, "must be an array");
        return;
      }
      shell.constructors.push({
        ref: qualifiedName(shell.ref.modulePath, constructor.name),
        args: args.map((arg: unknown, argIndex) => this.readType(arg, `${at}.args[${argIndex}]`)),
      });
    });
  }

  private fillTypeAlias(shell: TypeAliasShell, definition: Record<string, unknown>, path: string): void {
    if (definition.type === undefined) {
      this.problem(`${path}.type`, "is required");
      return;
    }
    shell.inner = this.readType(definition.type, `${path}.type`);
  }

  /**
   * Look a name up in the table, as written and then within the request module
   */
  private lookup(name: string): ResolvedType | undefined {
    return this.types.get(name) ?? this.types.get(formatQualifiedName(qualifiedName(this.modulePath, name)));
  }

  readType(value: unknown, path: string): ResolvedType {
    if (typeof value === "string") {
      return this.lookup(value) ?? { kind: "opaque", ref: parseQualifiedName(value), args: [] };
    }

    if (!isPlainObject(value)) {
      this.problem(path, "must be a type name or an object with a kind");
      return UNIT_TYPE;
    }

    switch (value.kind) {
      case "named": {
        const found = typeof value.name === "string" ? this.lookup(value.name) : undefined;
        if (!found) {
          this.problem(path, `unknown named type ${JSON.stringify(value.name)}`);
          return UNIT_TYPE;
        }
        return found;
      }

      case "opaque": {
        if (typeof value.name !== "string") {
          this.problem(`${path}.name`, "must be a dotted type name");
          return UNIT_TYPE;
        }
        const args = value.args === undefined ? [] : value.args;
        if (!Array.isArray(args)) {
          this.problem(`${path}.args`, "must be an array");
          return UNIT_TYPE;
        }
        return {
          kind: "opaque",
          ref: parseQualifiedName(value.name),
          args: args.map((arg: unknown, index) => this.readType(arg, `${path}.args[${index}]`)),
        };
      }

      case "record": {
        if (!Array.isArray(value.fields)) {
          this.problem(`${path}.fields`, "must be an array");
          return UNIT_TYPE;
        }
        const fields: RecordField[] = [];
        value.fields.forEach((field: unknown, index) => {
          const at = `${path}.fields[${index}]`;
          if (!isPlainObject(field) || typeof field.name !== "string") {
            this.problem(at, "must be an object with a name and a type");
            return;
          }
          fields.push({ name: field.name, type: this.readType(field.type, `${at}.type`) });
        });
        return { kind: "anonymousRecord", fields };
      }

      case "tuple": {
        if (!Array.isArray(value.elements)) {
          this.problem(`${path}.elements`, "must be an array");
          return UNIT_TYPE;
        }
        return {
          kind: "tuple",
          elements: value.elements.map((element: unknown, index) => this.readType(element, `${path}.elements[${index}]`)),
        };
      }

      case "function":
        return {
          kind: "function",
          from: this.readType(value.from, `${path}.from`),
          to: this.readType(value.to, `${path}.to`),
        };

      case "var":
        if (typeof value.name !== "string") {
          this.problem(`${path}.name`, "must be a string");
          return UNIT_TYPE;
        }
        return { kind: "typeVariable", name: value.name };

      default:
        this.problem(`${path}.kind`, `unknown kind ${JSON.stringify(value.kind)}`);
        return UNIT_TYPE;
    }
  }

  private readProviders(value: unknown): ProviderCandidate[] {
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
      this.problem("providers", "must be an array");
      return [];
    }

    const providers: ProviderCandidate[] = [];
    value.forEach((provider: unknown, index) => {
      const path = `providers[${index}]`;
      if (!isPlainObject(provider)) {
        this.problem(path, "must be an object");
        return;
      }
      const { generator, location, type } = provider;
      const scope = provider.scope === undefined ? "module-local" : provider.scope;
      if (typeof generator !== "string") {
        this.problem(`${path}.generator`, "must be a generator id");
        return;
      }
      if (typeof location !== "string" || !location.includes(".")) {
        this.problem(`${path}.location`, "must be a qualified name such as Module.name");
        return;
      }
      if (!isScope(scope)) {
        this.problem(`${path}.scope`, `must be one of ${SCOPE_PRIORITY.join(", ")}`);
        return;
      }
      providers.push({
        generatorId: generator,
        location: parseQualifiedName(location),
        declaredType: this.readType(type, `${path}.type`),
        scope,
      });
    });
    return providers;
  }

  private readDeclarations(value: unknown): DerivationRequest[] {
    if (!Array.isArray(value) || value.length === 0) {
      this.problem("declarations", "must be a non-empty array");
      return [];
    }

    const seen = new Set<string>();
    const declarations: DerivationRequest[] = [];
    value.forEach((declaration: unknown, index) => {
      const path = `declarations[${index}]`;
      if (!isPlainObject(declaration) || typeof declaration.name !== "string") {
        this.problem(path, "must be an object with a name");
        return;
      }
      if (seen.has(declaration.name)) {
        this.problem(`${path}.name`, `duplicate declaration ${declaration.name}`);
        return;
      }
      seen.add(declaration.name);

      const params = declaration.params === undefined ? [] : declaration.params;
      if (!isStringArray(params)) {
        this.problem(`${path}.params`, "must be an array of parameter names");
        return;
      }
      declarations.push({
        name: declaration.name,
        annotation: this.readType(declaration.annotation, `${path}.annotation`),
        params: params.map((param): Pattern => (param === "_" ? { kind: "wildcard" } : varPattern(param))),
      });
    });
    return declarations;
  }

  /**
   * An alias chain that returns to its start has no structure to derive from
   */
  private checkAliasCycles(): void {
    for (const [name, type] of this.types) {
      let current: ResolvedType = type;
      const visited = new Set<ResolvedType>();
      while (current.kind === "typeAlias" && !visited.has(current)) {
        visited.add(current);
        current = current.inner;
      }
      if (current === type && type.kind === "typeAlias") {
        this.problem(`types.${name}`, "type alias refers to itself");
      }
    }
  }
}

/**
 * Validate a parsed request and link its named types
 */
export function loadDerivationRequest(value: unknown): LoadedRequest {
  return new RequestReader().read(value);
}

export function readDerivationRequest(path: string): LoadedRequest {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new RequestValidationError([`${path}: ${error instanceof Error ? error.message : String(error)}`]);
  }
  return loadDerivationRequest(parsed);
}
