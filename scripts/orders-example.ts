#!/usr/bin/env node
/**
 * Example: clean a file of order rows and print the result.
 *
 * Usage:
 *   npx tsx scripts/orders-example.ts [path/to/orders.json]
 *
 * Reads a JSON array of objects, keeps date/product/quantity/total_price,
 * drops orders under 20, renames quantity -> qty and total_price -> revenue.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { loadConfig, ConfigError, type AppConfig } from "../src/config/index.js";
import { initRunId, createLogger } from "../src/logging/index.js";
import { createPipeline } from "../src/pipeline/index.js";
import { filterRows, renameKeys, selectKeys } from "../src/transforms/index.js";
import type { Row } from "../src/types/index.js";

const DEFAULT_INPUT = fileURLToPath(new URL("./data/orders.json", import.meta.url));

function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function* readOrders(path: string): Generator<Row, void, undefined> {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
  if (!Array.isArray(parsed)) {
    throw new Error(`Expected a JSON array in ${path}`);
  }
  const items: unknown[] = parsed;
  for (const item of items) {
    if (!isRow(item)) {
      throw new Error(`Expected an object row in ${path}, got: ${JSON.stringify(item)}`);
    }
    yield item;
  }
}

function main(): void {
  const runId = initRunId();

  let config: Readonly<AppConfig>;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.format());
      process.exit(1);
    }
    throw err;
  }

  const logger = createLogger({
    level: config.logLevel,
    logDir: config.logDir,
    file: config.logToFile,
  });
  logger.info("Example starting", { runId, appName: config.appName });

  const input = process.argv[2] ?? DEFAULT_INPUT;

  createPipeline({
    name: "orders-example",
    producer: () => readOrders(input),
    transformers: [
      selectKeys(["date", "product", "quantity", "total_price"]),
      filterRows((row) => Number(row.total_price ?? 0) >= 20),
      renameKeys({ quantity: "qty", total_price: "revenue" }),
    ],
    consumer: (rows) => {
      for (const row of rows) {
        console.log(JSON.stringify(row));
      }
    },
    logger,
  }).run();
}

main();
