/**
 * Shared type definitions for the derivation engine
 */

export type QualifiedName = {
  modulePath: string[];
  name: string;
};

// ---------------------------------------------------------------------------
// Resolved types
// ---------------------------------------------------------------------------

export type CustomTypeConstructor = {
  ref: QualifiedName;
  args: ResolvedType[];
};

export type RecordField = {
  name: string;
  type: ResolvedType;
};

/**
 * Fully qualified structural description of a type. Graphs may be cyclic:
 * a recursive custom type appears as the same object inside its own
 * constructors.
 */
export type ResolvedType =
  | { kind: "opaque"; ref: QualifiedName; args: ResolvedType[] }
  | { kind: "customType"; ref: QualifiedName; generics: string[]; constructors: CustomTypeConstructor[] }
  | { kind: "typeAlias"; ref: QualifiedName; generics: string[]; inner: ResolvedType }
  | { kind: "anonymousRecord"; fields: RecordField[] }
  | { kind: "tuple"; elements: ResolvedType[] }
  | { kind: "function"; from: ResolvedType; to: ResolvedType }
  | { kind: "typeVariable"; name: string };

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

export type Pattern =
  | { kind: "var"; name: string }
  | { kind: "wildcard" }
  | { kind: "tuple"; elements: Pattern[] }
  | { kind: "record"; fields: string[] }
  | { kind: "constructor"; ref: QualifiedName; args: Pattern[] };

export type CaseBranch = {
  pattern: Pattern;
  body: Expression;
};

export type LiteralValue = string | number | boolean | null;

/**
 * Synthesized code. Application is curried: applying a function to fewer
 * arguments than it has parameters is partial application.
 */
export type Expression =
  | { kind: "ref"; ref: QualifiedName }
  | { kind: "var"; name: string }
  | { kind: "literal"; value: LiteralValue }
  | { kind: "lambda"; params: Pattern[]; body: Expression }
  | { kind: "apply"; fn: Expression; args: Expression[] }
  | { kind: "record"; fields: { name: string; value: Expression }[] }
  | { kind: "tuple"; elements: Expression[] }
  | { kind: "list"; elements: Expression[] }
  | { kind: "access"; target: Expression; field: string }
  | { kind: "case"; scrutinee: Expression; branches: CaseBranch[] };

// ---------------------------------------------------------------------------
// Type patterns
// ---------------------------------------------------------------------------

export type TypePattern =
  | { kind: "target" }
  | { kind: "opaque"; ref: QualifiedName; args: TypePattern[] }
  | { kind: "function"; from: TypePattern; to: TypePattern }
  | { kind: "tuple"; elements: TypePattern[] };

// ---------------------------------------------------------------------------
// Resolvers and generator definitions
// ---------------------------------------------------------------------------

export type ConstructorBranch = {
  name: string;
  expression: Expression;
};

export type Resolver =
  | {
      kind: "primitive";
      ref: QualifiedName;
      resolve: (args: ResolvedType[], children: Expression[]) => Expression | undefined;
    }
  | { kind: "universal"; resolve: (type: ResolvedType) => Expression | undefined }
  | {
      kind: "combiner";
      combine: (type: ResolvedType, constructor: Expression, children: Expression[]) => Expression | undefined;
    }
  | {
      kind: "customType";
      combine: (constructors: CustomTypeConstructor[], branches: ConstructorBranch[]) => Expression;
    };

export type LambdaBreaker = (expression: Expression) => Expression;

export type Condition = { kind: "always" } | { kind: "dependencies"; names: string[] };

export type DefinitionItem =
  | { kind: "resolver"; resolver: Resolver }
  | { kind: "lambdaBreaker"; wrap: LambdaBreaker };

export type Definition = {
  condition: Condition;
  item: DefinitionItem;
};

export type GenericDefinition = {
  kind: "generic";
  id: string;
  dependency?: string;
  searchPattern: TypePattern;
  makeName: (typeName: string) => string;
  definitions: Definition[];
  blessed: QualifiedName[];
};

export type AmendmentDefinition = {
  kind: "amendment";
  id: string;
  definitions: Definition[];
};

export type GeneratorDefinition = GenericDefinition | AmendmentDefinition;

export type ActivationContext = ReadonlySet<string>;

export type ResolvedGenerator = {
  id: string;
  searchPattern: TypePattern;
  resolvers: Resolver[];
  lambdaBreaker?: LambdaBreaker;
  makeName: (typeName: string) => string;
  blessed: QualifiedName[];
};

// ---------------------------------------------------------------------------
// Generation inputs and outputs
// ---------------------------------------------------------------------------

export type KnownProvider = {
  generatorId: string;
  location: QualifiedName;
  declaredType: ResolvedType;
};

export type AuxiliaryDeclaration = {
  name: string;
  type: ResolvedType;
  body: Expression;
};

export type GenerateResult =
  | { ok: true; expression: Expression; declarations: AuxiliaryDeclaration[] }
  | { ok: false; error: string };

export type Declaration = {
  name: string;
  params: Pattern[];
  body: Expression;
};

export type EmittedDeclaration = Declaration & {
  type: ResolvedType;
};

export type DerivationRequest = {
  name: string;
  annotation: ResolvedType;
  params: Pattern[];
};

export type DerivationResult =
  | {
      ok: true;
      generatorId: string;
      declaration: EmittedDeclaration;
      auxiliary: EmittedDeclaration[];
    }
  | { ok: false; error: string };

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export type Config = {
  envSearchPaths?: string[];
  outputDir?: string;
  capabilities?: string[];
  generators?: string[];
  logLevel?: "debug" | "info" | "warn" | "error";
  imports?: Record<string, string>;
  runtimeModule?: string;
};
