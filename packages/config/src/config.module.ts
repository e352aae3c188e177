import { Global, Module } from "@nestjs/common";
import { createLoggerProvider, IoModule } from "@repokit/io";
import {
  CONFIG_LOGGER_SCOPE,
  ConfigurableModuleClass,
  MODULE_OPTIONS_TOKEN,
} from "./config.const";
import { DefaultConfigLoader } from "./default-config.loader";
import { resolveRuntimeOptions } from "./runtime-env";
import type { ConfigModuleOptions } from "./types";

@Global()
@Module({
  imports: [IoModule],
  providers: [DefaultConfigLoader, createLoggerProvider(CONFIG_LOGGER_SCOPE)],
  exports: [DefaultConfigLoader],
})
export class ConfigModule extends ConfigurableModuleClass {
  static register(
    options: ConfigModuleOptions
  ): ReturnType<(typeof ConfigurableModuleClass)["register"]> {
    const resolved = resolveRuntimeOptions(options);
    const dynamicModule = super.register(resolved);
    return {
      ...dynamicModule,
      exports: [...(dynamicModule.exports ?? []), MODULE_OPTIONS_TOKEN],
      global: true,
    };
  }
}
