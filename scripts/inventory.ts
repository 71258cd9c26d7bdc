#!/usr/bin/env tsx

/**
 * Command-line front end for the inventory service.
 *
 * How to run:
 *   npx tsx scripts/inventory.ts add-set 75192 --assembled
 *   npx tsx scripts/inventory.ts list --state OWNED_FREE
 *   npx tsx scripts/inventory.ts update --part 3001 --color 5 --qty 3 --state MISSING
 *   npx tsx scripts/inventory.ts search "falcon" --limit 5
 *   npx tsx scripts/inventory.ts health
 *
 * Reads the same BRICKLINK_* / LEGO_DB_PATH settings as the server (.env is loaded).
 */

import "dotenv/config";

import { hideBin } from "yargs/helpers";
import yargs from "yargs";

import { InventoryItemNotFoundError } from "../server/catalog/errors";
import { createContainer, type Container } from "../server/container";
import { pieceStates } from "../server/inventory/schema";
import { loadConfig } from "../server/lib/external/env";

const print = (value: unknown) => {
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(value, null, 2));
};

async function withContainer(run: (container: Container) => Promise<void> | void) {
  const container = createContainer(loadConfig());
  try {
    await run(container);
  } finally {
    container.close();
  }
}

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName("inventory")
    .command(
      "add-set <setNo>",
      "Import a set's parts from BrickLink",
      (y) =>
        y
          .positional("setNo", { type: "string", demandOption: true, describe: "Set number" })
          .option("assembled", {
            type: "boolean",
            default: false,
            describe: "Mark the parts as locked into the built set",
          }),
      (argv) =>
        withContainer(async ({ service }) => {
          print(await service.addSet(argv.setNo, argv.assembled));
        }),
    )
    .command(
      "list",
      "List inventory records",
      (y) => y.option("state", { choices: pieceStates, describe: "Only records in this state" }),
      (argv) =>
        withContainer(({ service }) => {
          const items = service.listInventory(argv.state);
          print({ items, count: items.length });
        }),
    )
    .command(
      "update",
      "Set the quantity and state of one inventory record",
      (y) =>
        y
          .option("part", { type: "string", demandOption: true })
          .option("color", { type: "number", demandOption: true })
          .option("qty", { type: "number", demandOption: true })
          .option("state", { choices: pieceStates, demandOption: true })
          .option("set", { type: "string", describe: "Restrict the match to one set" }),
      (argv) =>
        withContainer(({ service }) => {
          const updated = service.updateItem({
            partNo: argv.part,
            colorId: argv.color,
            qty: argv.qty,
            state: argv.state,
            setNo: argv.set,
          });
          if (!updated) {
            throw new InventoryItemNotFoundError(argv.part, argv.color);
          }
          print({ ok: true });
        }),
    )
    .command(
      "search <query>",
      "Search the BrickLink set catalog",
      (y) =>
        y
          .positional("query", { type: "string", demandOption: true })
          .option("limit", { type: "number", default: 20 }),
      (argv) =>
        withContainer(async ({ service }) => {
          const items = await service.searchSets(argv.query, argv.limit);
          print({ items, count: items.length });
        }),
    )
    .command(
      "health",
      "Probe the BrickLink API",
      (y) => y,
      () =>
        withContainer(async ({ catalog }) => {
          const result = await catalog.checkHealth();
          print(result);
          if (!result.ok) {
            process.exitCode = 1;
          }
        }),
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
  process.exit(1);
});
