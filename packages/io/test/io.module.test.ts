import { Test } from "@nestjs/testing";
import type { Logger } from "pino";
import { describe, expect, it } from "vitest";
import { IoModule } from "../src/io.module";
import {
  createLoggerProvider,
  getLoggerToken,
} from "../src/logger.decorator";
import { LoggerService } from "../src/logger.service";

describe("IoModule", () => {
  it("provides a single logger service and the root logger", async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [IoModule],
    }).compile();

    const service = moduleRef.get(LoggerService);

    expect(moduleRef.get(LoggerService)).toBe(service);
    expect(moduleRef.get<symbol, Logger>(getLoggerToken())).toBe(
      service.getLogger()
    );

    await moduleRef.close();
  });

  it("resolves scoped loggers through their providers", async () => {
    const provider = createLoggerProvider("dispatch");
    const moduleRef = await Test.createTestingModule({
      imports: [IoModule],
      providers: [provider],
    }).compile();

    const logger = moduleRef.get<symbol, Logger>(getLoggerToken("dispatch"));

    expect(createLoggerProvider("dispatch")).toBe(provider);
    expect(logger.bindings()).toEqual({ scope: "dispatch" });

    await moduleRef.close();
  });
});
