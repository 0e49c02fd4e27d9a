import pino from "pino";

const isTest = process.env.NODE_ENV === "test";

export const logger = pino({
  name: "biotoken",
  level: process.env.LOG_LEVEL ?? (isTest ? "silent" : "info"),
});
