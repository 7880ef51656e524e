#!/usr/bin/env node
/**
 * derivegen-build: derive the declarations of a request file into a module
 *
 *   derivegen-build path/to/request.json
 */

import { mkdirSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { Project } from "ts-morph";
import {
  ConfigManager,
  auditFileName,
  buildModule,
  globalAuditLog,
  globalLogger,
  outputFileName,
  readDerivationRequest,
} from "./lib";

const PROJECT_ROOT = process.cwd();
const DEFAULT_REQUEST = "examples/shapes.request.json";

function main(): void {
  const config = new ConfigManager(PROJECT_ROOT);
  config.loadEnvFiles();
  globalLogger.setLevel(config.getLogLevel());

  const requestPath = config.expandPath(process.argv[2] || process.env.DERIVEGEN_REQUEST || DEFAULT_REQUEST);
  globalLogger.info(`Processing ${requestPath}`, { capabilities: config.getCapabilities() });

  const request = readDerivationRequest(requestPath);
  const outputPath = join(config.getOutputDir(), outputFileName(request.modulePath));

  const project = new Project({ useInMemoryFileSystem: true });
  globalLogger.startTimer("build");
  const { sourceFile, emitted, failures } = globalLogger.withContext({ phase: "build" }, () =>
    buildModule(project, outputPath, request, {
      activation: config.getActivation(),
      enabledGenerators: config.getGenerators(),
      emit: { imports: config.getImports(), runtimeModule: config.getRuntimeModule() },
      logger: globalLogger,
      audit: globalAuditLog,
    })
  );

  globalLogger.endTimer("build", "Derivation finished", "info");

  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, sourceFile.getFullText(), "utf8");
  writeFileSync(auditFileName(outputPath), JSON.stringify(globalAuditLog, null, 2), "utf8");
  globalLogger.info(`Wrote ${outputPath} with ${emitted.length} declaration(s)`, globalAuditLog.getSummary());

  if (failures.length > 0) {
    for (const failure of failures) {
      globalLogger.error(`${failure.declaration}: ${failure.error}`);
    }
    process.exitCode = 1;
  }
}

try {
  main();
} catch (error) {
  globalLogger.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}
