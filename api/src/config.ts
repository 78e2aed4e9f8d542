// api/src/config.ts
import dotenv from "dotenv";
dotenv.config();

type NodeEnv = "development" | "production" | "test";

interface Config {
  port: number;
  jwtSecret: string;
  databaseUrl: string;
  corsOrigin: string[];
  nodeEnv: NodeEnv;
}

function readNodeEnv(value: string | undefined): NodeEnv {
  return value === "production" || value === "test" ? value : "development";
}

function validateEnv(): Config {
  const jwtSecret = process.env.JWT_SECRET;
  const databaseUrl = process.env.DATABASE_URL;
  const missing = [
    !jwtSecret && "JWT_SECRET",
    !databaseUrl && "DATABASE_URL",
  ].filter((key): key is string => Boolean(key));
  if (!jwtSecret || !databaseUrl) {
    throw new Error(`Missing required environment variables: ${missing.join(", ")}`);
  }

  return {
    port: parseInt(process.env.PORT || "8080", 10),
    jwtSecret,
    databaseUrl,
    corsOrigin: (process.env.CORS_ORIGIN || "http://localhost:5173").split(","),
    nodeEnv: readNodeEnv(process.env.NODE_ENV),
  };
}

export const config = validateEnv();
