import { Global, Module, type DynamicModule } from "@nestjs/common";
import { ConfigModule as NestConfigModule, type ConfigType } from "@nestjs/config";
import { CONSOLE_SETTINGS } from "./config.const";
import { consoleConfig } from "./config.namespace";
import type { ConsoleSettings } from "./types";

export interface ConfigModuleOptions {
  envFilePath?: string | string[];
  /** Skip `.env` files entirely and read only the process environment. */
  ignoreEnvFile?: boolean;
}

const DEFAULT_ENV_FILES = [".env.local", ".env"];

@Global()
@Module({})
export class ConfigModule {
  static forRoot(options: ConfigModuleOptions = {}): DynamicModule {
    return {
      module: ConfigModule,
      imports: [
        NestConfigModule.forRoot({
          envFilePath: options.envFilePath ?? DEFAULT_ENV_FILES,
          ignoreEnvFile: options.ignoreEnvFile ?? false,
          load: [consoleConfig],
          cache: true,
        }),
      ],
      providers: [
        {
          provide: CONSOLE_SETTINGS,
          inject: [consoleConfig.KEY],
          useFactory: (settings: ConfigType<typeof consoleConfig>): ConsoleSettings => settings,
        },
      ],
      exports: [CONSOLE_SETTINGS],
    };
  }
}
