import { ConfigurationError } from "../../core/errors";
import {
  DEFAULT_SOURCE_URL_TEMPLATE,
  sourceUrlPlaceholders
} from "../../infrastructure/source/FullDiskTileHttpClient";

export type StateStoreKind = "sqlite" | "mongo";

export type Env = {
  STATE_STORE: StateStoreKind;
  /** Overrides `<data-dir>/state/tasks.db`. */
  STATE_DB_PATH?: string;
  MONGO_URI: string;
  SOURCE_URL_TEMPLATE: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigurationError(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigurationError(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const validateSourceTemplate = (name: string, value: string): string => {
  validateHttpUrl(name, value);
  for (const placeholder of sourceUrlPlaceholders) {
    if (!value.includes(placeholder)) {
      throw new ConfigurationError(`${name} must contain the placeholder ${placeholder}. Received: ${value}`);
    }
  }
  return value;
};

const validateMongoUri = (name: string, value: string): string => {
  if (!value.startsWith("mongodb://") && !value.startsWith("mongodb+srv://")) {
    throw new ConfigurationError(`${name} must use the mongodb or mongodb+srv scheme. Received: ${value}`);
  }
  return value;
};

const parseStateStore = (raw: string | undefined): StateStoreKind => {
  const value = raw?.trim().toLowerCase() || "sqlite";
  if (value === "sqlite" || value === "mongo") return value;
  throw new ConfigurationError(`STATE_STORE must be one of sqlite, mongo. Received: ${raw ?? ""}`);
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const STATE_STORE = parseStateStore(env.STATE_STORE);
  const STATE_DB_PATH = env.STATE_DB_PATH?.trim() ? env.STATE_DB_PATH.trim() : undefined;
  const MONGO_URI = validateMongoUri("MONGO_URI", env.MONGO_URI ?? "mongodb://localhost:27017/full_disk");
  const SOURCE_URL_TEMPLATE = validateSourceTemplate(
    "SOURCE_URL_TEMPLATE",
    env.SOURCE_URL_TEMPLATE ?? DEFAULT_SOURCE_URL_TEMPLATE
  );

  return { STATE_STORE, STATE_DB_PATH, MONGO_URI, SOURCE_URL_TEMPLATE };
};
