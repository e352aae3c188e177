import {
  ConfigurableModuleBuilder,
  Module,
  type DynamicModule,
} from "@nestjs/common";
import { ConfigModule, type ConfigModuleOptions } from "@repokit/config";
import { IoModule } from "@repokit/io";
import { CliModule } from "./cli/cli.module";

export type AppModuleOptions = ConfigModuleOptions;

const { ConfigurableModuleClass } =
  new ConfigurableModuleBuilder<AppModuleOptions>({
    moduleName: "RepokitCli",
  }).build();

const appendConfigImport = <T extends DynamicModule>(
  dynamicModule: T,
  configImport: DynamicModule
): T => ({
  ...dynamicModule,
  imports: [...(dynamicModule.imports ?? []), configImport],
});

@Module({
  imports: [IoModule, CliModule],
})
export class AppModule extends ConfigurableModuleClass {
  static forRoot(
    options: AppModuleOptions = {}
  ): ReturnType<(typeof ConfigurableModuleClass)["register"]> {
    const dynamicModule = super.register(options);
    return appendConfigImport(dynamicModule, ConfigModule.register(options));
  }
}
