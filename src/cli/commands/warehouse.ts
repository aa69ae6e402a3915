import chalk from "chalk";
import ora from "ora";

import { checkConnection, createConnection } from "../../db/connection.js";
import { toError } from "../../errors.js";
import { listSources } from "../../sources/index.js";
import { WarehouseClient } from "../../services/warehouse/client.js";
import { printError, printWarning } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Warehouse Commands
// ============================================================================

export function registerWarehouseCommand(program: Command): void {
  const warehouse = program
    .command("warehouse")
    .description("Warehouse connection and maintenance");

  // warehouse status
  warehouse
    .command("status")
    .description("Check the connection and list target tables")
    .action(async () => {
      const connection = createConnection();
      const client = new WarehouseClient(connection);

      try {
        console.log(`Warehouse: ${connection.url}`);

        if (!(await checkConnection(connection))) {
          printError("Warehouse is not reachable");
          process.exitCode = 1;
          return;
        }
        console.log(chalk.green("Connection OK\n"));

        for (const { definition } of listSources()) {
          const name = client.tableName(definition.dataset, definition.table);
          const exists = await client.tableExists(
            definition.dataset,
            definition.table
          );
          console.log(
            `  ${name.padEnd(32)} ${exists ? chalk.green("present") : chalk.gray("not created")}`
          );
        }

        const staging = await client.listStagingTables();
        if (staging.length > 0) {
          console.log();
          printWarning(
            `${String(staging.length)} orphaned staging tables; run 'warehouse clean-staging'`
          );
        }
      } catch (error) {
        printError(toError(error).message);
        process.exitCode = 1;
      } finally {
        await connection.close();
      }
    });

  // warehouse clean-staging
  warehouse
    .command("clean-staging")
    .description("Drop staging tables left behind by interrupted runs")
    .option("--dry-run", "List the tables without dropping them")
    .action(async (options: { dryRun?: boolean }) => {
      const connection = createConnection();
      const client = new WarehouseClient(connection);
      const spinner = ora("Looking for staging tables...").start();

      try {
        if (options.dryRun === true) {
          const names = await client.listStagingTables();
          spinner.info(`${String(names.length)} staging tables found`);
          for (const name of names) console.log(`  ${name}`);
          return;
        }

        const dropped = await client.dropStagingTables();
        spinner.succeed(`Dropped ${String(dropped.length)} staging tables`);
        for (const name of dropped) console.log(chalk.gray(`  ${name}`));
      } catch (error) {
        spinner.fail(`Failed: ${toError(error).message}`);
        process.exitCode = 1;
      } finally {
        await connection.close();
      }
    });
}
