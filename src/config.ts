import { DASHBOARD_DAYS } from "./analysis/responses.js";
import { isLogLevel, type LogLevel } from "./logger.js";

export interface Config {
  dataPath: string;
  server: {
    port: number;
    transport: "stdio" | "http";
    corsOrigins: string[];
  };
  analytics: {
    insightsTopProducts: number;
    dashboardTopProducts: number;
    dashboardDefaultDays: number;
  };
  logLevel: LogLevel;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv.slice(2),
): Config {
  const logLevel = env.LOG_LEVEL || "info";
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${logLevel}`);
  }

  const dashboardDefaultDays = positiveInt(env, "DASHBOARD_DEFAULT_DAYS", DASHBOARD_DAYS.default);
  if (dashboardDefaultDays > DASHBOARD_DAYS.max) {
    throw new Error(`DASHBOARD_DEFAULT_DAYS must not exceed ${DASHBOARD_DAYS.max}`);
  }

  return {
    dataPath: env.DATA_PATH || "data/sales_data.csv",
    server: {
      port: positiveInt(env, "PORT", 8000),
      transport: resolveTransport(env, argv),
      corsOrigins: (env.CORS_ORIGINS || "*").split(",").map((o) => o.trim()),
    },
    analytics: {
      insightsTopProducts: positiveInt(env, "INSIGHTS_TOP_PRODUCTS", 2),
      dashboardTopProducts: positiveInt(env, "DASHBOARD_TOP_PRODUCTS", 5),
      dashboardDefaultDays,
    },
    logLevel,
  };
}

function resolveTransport(
  env: NodeJS.ProcessEnv,
  argv: string[],
): "stdio" | "http" {
  // CLI flag takes precedence
  const transportIdx = argv.indexOf("--transport");
  const flag = transportIdx !== -1 ? argv[transportIdx + 1] : undefined;
  if (flag === "stdio" || flag === "http") return flag;

  const envTransport = env.TRANSPORT;
  if (envTransport === "stdio" || envTransport === "http") return envTransport;

  return "http";
}

function positiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${key} must be a positive integer, received "${raw}"`);
  }
  return value;
}
