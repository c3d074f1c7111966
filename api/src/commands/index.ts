/**
 * Index commands.
 *
 * Runs maintenance commands against named indexes. An engine failure on one
 * index is logged and reported, and the next index still runs.
 */

import { Command } from "commander";
import { Effect } from "effect";
import type { ManagedRuntime } from "effect";
import type { Environment } from "../services/environment";
import { updateIndex } from "../services/search";
import type {
  IndexMappings,
  SearchModels,
  SearchTransport,
  SyncError,
} from "../services/search";

/**
 * What a command reported for one index.
 */
export type IndexCommandResult =
  | { index: string; documents: number }
  | { index: string; status: number; reason: string };

/**
 * Run `command` on each index in turn and log what it reports.
 */
export const runIndexCommand = <R>(
  indexes: ReadonlyArray<string>,
  command: (index: string) => Effect.Effect<IndexCommandResult, SyncError, R>
) =>
  Effect.forEach(indexes, (index) =>
    command(index).pipe(
      Effect.catchTag("TransportFailure", (error) =>
        Effect.logWarning(
          `[SEARCH][command] Search engine error on ${index}: ${error.message}`
        ).pipe(
          Effect.as<IndexCommandResult>({
            index,
            status: error.status,
            reason: error.reason,
          })
        )
      ),
      Effect.tap((data) =>
        Effect.logInfo(`[SEARCH][command] ${JSON.stringify(data)}`)
      )
    )
  );

/**
 * Services the commands need.
 */
export type CommandServices =
  | SearchTransport
  | SearchModels
  | IndexMappings
  | Environment;

/**
 * Build the command-line program.
 *
 * @example
 * ```typescript
 * const runtime = ManagedRuntime.make(SearchLive);
 * await createCli(runtime).parseAsync(process.argv);
 * await runtime.dispose();
 * ```
 */
export function createCli<E>(
  runtime: ManagedRuntime.ManagedRuntime<CommandServices, E>
): Command {
  const program = new Command();

  program
    .name("search-sync")
    .description("Search index maintenance");

  program
    .command("update")
    .description("Push every record of each index's models to the engine")
    .argument("<indexes...>", "Names of indexes on which to run the command")
    .action(async (indexes: string[]) => {
      await runtime.runPromise(runIndexCommand(indexes, updateIndex));
    });

  return program;
}
