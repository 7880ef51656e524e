/**
 * Module build
 * Derives every declaration of a request, in order, and emits the module.
 * Each emitted declaration becomes a provider for the ones after it.
 */

import { Project, SourceFile } from "ts-morph";
import { ActivationContext, EmittedDeclaration, GeneratorDefinition, KnownProvider } from "./types";
import { AuditLog } from "./audit";
import { BUILT_IN_GENERATORS } from "./catalog";
import { deriveDeclaration } from "./derive";
import { EmitOptions, emitModule } from "./emitter";
import { Logger } from "./logger";
import { LoadedRequest } from "./request-loader";
import { formatProviderRanking, rankProviders } from "./provider-selector";
import { resolveGenerators } from "./registry";
import { qualifiedName } from "./utils";

export type BuildOptions = {
  activation: ActivationContext;
  definitions?: GeneratorDefinition[];
  /** Generator ids to enable; all when absent */
  enabledGenerators?: string[];
  emit?: EmitOptions;
  logger?: Logger;
  audit?: AuditLog;
};

export type BuildFailure = {
  declaration: string;
  error: string;
};

export type BuildResult = {
  sourceFile: SourceFile;
  emitted: EmittedDeclaration[];
  failures: BuildFailure[];
};

export function outputFileName(modulePath: string[]): string {
  return `${modulePath.join(".")}.derived.ts`;
}

/** Audit trail written beside the module, e.g. `Shapes.derived.audit.json` */
export function auditFileName(outputPath: string): string {
  return outputPath.replace(/\.ts$/, "") + ".audit.json";
}

export function buildModule(project: Project, filePath: string, request: LoadedRequest, options: BuildOptions): BuildResult {
  const { logger, audit, enabledGenerators } = options;
  const generators = resolveGenerators(options.activation, options.definitions ?? BUILT_IN_GENERATORS).filter(
    (generator) => enabledGenerators === undefined || enabledGenerators.includes(generator.id)
  );
  logger?.debug("Resolved generators", { generators: generators.map((generator) => generator.id) });

  const rankings = rankProviders(request.providers, generators);
  audit?.recordProviderRanking(rankings);
  rankings.forEach((ranking, index) => logger?.debug(formatProviderRanking(ranking, index)));
  const providers: KnownProvider[] = rankings.map((ranking) => ranking.provider);

  const requested = request.declarations.map((declaration) => declaration.name);
  const emitted: EmittedDeclaration[] = [];
  const failures: BuildFailure[] = [];

  for (const declaration of request.declarations) {
    const reservedNames = new Set([...requested, ...emitted.map((done) => done.name)]);
    const result = deriveDeclaration(generators, declaration, providers, { reservedNames, logger, audit });

    if (!result.ok) {
      logger?.error(`Could not derive ${declaration.name}`, { error: result.error });
      failures.push({ declaration: declaration.name, error: result.error });
      continue;
    }

    for (const derived of [...result.auxiliary, result.declaration]) {
      emitted.push(derived);
      providers.push({ generatorId: result.generatorId, location: qualifiedName([], derived.name), declaredType: derived.type });
    }
    logger?.info(`Derived ${declaration.name}`, { generator: result.generatorId, auxiliary: result.auxiliary.length });
  }

  const sourceFile = emitModule(project, filePath, emitted, options.emit);
  return { sourceFile, emitted, failures };
}
