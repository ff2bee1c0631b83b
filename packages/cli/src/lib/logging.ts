import {
  configure,
  type TextFormatter,
  getConsoleSink,
  getJsonLinesFormatter,
  type LogLevel,
} from "@logtape/logtape";

export interface LoggingOptions {
  /** JSON Lines output instead of the pretty console format. */
  production?: boolean;
  /** Lowest level emitted for benchmark categories. Default: debug, or info in production. */
  lowestLevel?: LogLevel;
}

export async function setupLogging(options: LoggingOptions = {}): Promise<void> {
  const production = options.production ?? process.env.NODE_ENV === "production";

  let formatter: TextFormatter;
  if (production) {
    formatter = getJsonLinesFormatter();
  } else {
    const { prettyFormatter } = await import("@logtape/pretty");
    formatter = prettyFormatter;
  }

  await configure({
    reset: true,
    sinks: {
      console: getConsoleSink({ formatter }),
    },
    loggers: [
      {
        category: ["logtape", "meta"],
        sinks: ["console"],
        lowestLevel: "warning",
      },
      {
        category: ["contract-bench"],
        sinks: ["console"],
        lowestLevel: options.lowestLevel ?? (production ? "info" : "debug"),
      },
    ],
  });
}
