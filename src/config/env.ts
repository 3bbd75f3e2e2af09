import dotenv from "dotenv";

dotenv.config();

export type RequestLogMode = "verbose" | "simple" | "off";

const LOG_MODES: readonly RequestLogMode[] = ["verbose", "simple", "off"];

const parsePort = (value: string | undefined, fallback: number): number => {
  const port = Number(value);
  return Number.isInteger(port) && port > 0 ? port : fallback;
};

const parseLogMode = (value: string | undefined): RequestLogMode => {
  const mode = LOG_MODES.find((m) => m === value);
  if (mode) return mode;
  return process.env.NODE_ENV === "test" ? "off" : "simple";
};

export const config = {
  accountsPort: parsePort(process.env.ACCOUNTS_PORT, 8000),
  catalogPort: parsePort(process.env.CATALOG_PORT, 8001),
  deliveryPort: parsePort(process.env.DELIVERY_PORT, 8002),
  requestLog: parseLogMode(process.env.REQUEST_LOG),
};
