/**
 * Structured logging (pino).
 *
 * Level comes from LOG_LEVEL; under vitest the default is "silent".
 * Output goes to stderr so CLI stdout stays machine-readable.
 * Never log plaintext, key material or raw ciphertext.
 */

import pino from "pino";

export type Logger = pino.Logger;

export function createLogger(name = "chatvault"): Logger {
  const isTest =
    process.env["NODE_ENV"] === "test" || process.env["VITEST"] !== undefined;
  return pino(
    {
      name,
      level: process.env["LOG_LEVEL"] ?? (isTest ? "silent" : "info"),
    },
    pino.destination({ dest: 2, sync: true }),
  );
}

/** Logger that discards everything. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
