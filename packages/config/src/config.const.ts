import { ConfigurableModuleBuilder } from "@nestjs/common";
import type { ConfigModuleOptions } from "./types";

export const { ConfigurableModuleClass, MODULE_OPTIONS_TOKEN } =
  new ConfigurableModuleBuilder<ConfigModuleOptions>().build();

export const CONFIG_LOGGER_SCOPE = "config";
