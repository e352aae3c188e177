#!/usr/bin/env node
import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { resolveConfigRuntimeOptionsFromEnv } from "@repokit/config";
import { LoggerService } from "@repokit/io";
import { AppModule } from "./app.module";
import { CliRunnerService } from "./cli/cli-runner.service";

async function bootstrap(): Promise<void> {
  const runtimeOptions = resolveConfigRuntimeOptionsFromEnv(process.env);
  const app = await NestFactory.createApplicationContext(
    AppModule.forRoot(runtimeOptions),
    { logger: false }
  );

  let exitCode = 0;

  try {
    app.get(LoggerService).configure({
      level: runtimeOptions.logLevel ?? "info",
      destination: { type: "stderr" },
    });
    const runner = app.get(CliRunnerService);
    exitCode = await runner.run(process.argv.slice(2));
  } catch (error) {
    exitCode = 1;
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
  } finally {
    await app.close();
    process.exitCode = exitCode;
  }
}

void bootstrap();
