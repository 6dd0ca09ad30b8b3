import { ConfigError } from "./config.error";

export type Env = {
  HOST: string;
  PORT: number;
};

const validatePort = (name: string, value: string): number => {
  const port = Number(value);
  if (value.trim() === "" || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(name, `${name} must be an integer port in range [0..65535]. Received: ${value}`);
  }
  return port;
};

const validateHost = (name: string, value: string): string => {
  const host = value.trim();
  if (host === "") {
    throw new ConfigError(name, `${name} must not be empty`);
  }
  return host;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const HOST = validateHost("HOST", env.HOST ?? "0.0.0.0");
  const PORT = validatePort("PORT", env.PORT ?? "62985");

  return { HOST, PORT };
};
