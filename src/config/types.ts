export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";
export type LogFormat = "pretty" | "json";

export interface Config {
  data: {
    root: string;
    loadOrderDir: string;
    settingsPath: string;
  };

  patch: {
    dbPath: string;
    pluginName: string;
  };

  logging: {
    level: LogLevel;
    scopes?: string[]; // empty/undefined => all
    format: LogFormat;
  };
}
