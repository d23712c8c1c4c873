import { Command } from "commander";
import type { AppConfig, TidalEvent, TideTableSnapshot } from "@tidetable/contracts";
import {
  applyEnvOverrides,
  createConsoleLogger,
  DEFAULT_CONFIG_PATH,
  formatEpoch,
  formatTimeSpan,
  loadConfig,
  resolveQueryTime,
  saveConfig,
  setConfigValue,
  TideTable,
  timeFrom,
  type FetchLike,
  type JsonChunk,
} from "@tidetable/core";

export interface CliIo {
  stdout(line: string): void;
  stderr(line: string): void;
  stdin(): AsyncIterable<JsonChunk>;
  fetchImpl?: FetchLike;
  nowMs?: () => number;
}

export const processIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  stdin: () => process.stdin,
};

type GlobalOptions = {
  config: string;
  file?: string;
  verbose?: boolean;
};

interface QueryOptions {
  at?: string;
  json?: boolean;
}

const STDIN_TOKEN = "-";

function printTable(io: CliIo, rows: string[][]): void {
  const header = rows[0];
  if (!header) return;
  const widths = header.map((_, col) => Math.max(...rows.map((row) => (row[col] ?? "").length)));
  for (const [idx, row] of rows.entries()) {
    const line = row
      .map((cell, col) => cell.padEnd(widths[col] ?? 0))
      .join(idx === 0 ? " | " : "   ")
      .trimEnd();
    io.stdout(line);
    if (idx === 0) {
      io.stdout(widths.map((width) => "-".repeat(width)).join("-+-"));
    }
  }
}

function tideKind(event: TidalEvent): string {
  return event.isHighTide ? "HighWater" : "LowWater";
}

function describeEvent(event: TidalEvent): string {
  return `${tideKind(event)} ${formatEpoch(event.epochTime)} ${event.heightM.toFixed(2)}m`;
}

function describeLoad(snapshot: TideTableSnapshot): string {
  const parts = [
    `${snapshot.count} events from ${snapshot.source || "-"}`,
    `capacity ${snapshot.capacity}`,
    `${snapshot.skipped.length} skipped`,
    `${snapshot.dropped} dropped`,
  ];
  return parts.join(", ");
}

function parseValue(input: string): unknown {
  if (input === "true") return true;
  if (input === "false") return false;
  const numeric = Number(input);
  // Keep text that would not survive a number round trip, e.g. station "0113".
  if (!Number.isNaN(numeric) && String(numeric) === input.trim()) return numeric;
  return input;
}

function flattenConfig(config: AppConfig): string[] {
  const lines: string[] = [];
  for (const [section, values] of Object.entries(config)) {
    for (const [key, value] of Object.entries(values)) {
      lines.push(`${section}.${key} = ${JSON.stringify(value)}`);
    }
  }
  return lines;
}

export function createProgram(io: CliIo = processIo): Command {
  const program = new Command();
  program.name("tidetable").description("Load tidal event feeds and answer previous/next tide queries");
  program.option("--config <path>", "Config path", process.env.TIDETABLE_CONFIG ?? DEFAULT_CONFIG_PATH);
  program.option("--file <path>", "Read events from a JSON feed file ('-' for stdin) instead of the configured source");
  program.option("--verbose", "Log load diagnostics to stderr");
  program.configureOutput({
    writeOut: (text) => io.stdout(text.trimEnd()),
    writeErr: (text) => io.stderr(text.trimEnd()),
  });

  async function openTable(): Promise<TideTable> {
    const opts = program.opts<GlobalOptions>();
    const config = applyEnvOverrides(await loadConfig(opts.config));
    const logger = createConsoleLogger({ verbose: Boolean(opts.verbose), write: io.stderr });
    const table = new TideTable(config, io.fetchImpl ? { logger, fetchImpl: io.fetchImpl } : { logger });
    if (opts.file === STDIN_TOKEN) {
      await table.loadChunks(io.stdin(), "stdin");
    } else if (opts.file) {
      await table.loadFile(opts.file);
    } else {
      await table.refresh();
    }
    return table;
  }

  function queryTime(opts: QueryOptions): number {
    return resolveQueryTime(opts.at, io.nowMs?.());
  }

  async function renderNeighbour(direction: "previous" | "next", opts: QueryOptions): Promise<void> {
    const table = await openTable();
    const at = queryTime(opts);
    const event = direction === "previous" ? table.previous(at) : table.next(at);
    const span = event.isValid ? timeFrom(event, at) : null;
    if (opts.json) {
      io.stdout(JSON.stringify({ at, event, span }, null, 2));
      return;
    }
    if (!span) {
      io.stdout("none");
      return;
    }
    const relation = direction === "previous" ? `${formatTimeSpan(span)} ago` : `in ${formatTimeSpan(span)}`;
    io.stdout(`${describeEvent(event)} (${relation})`);
  }

  program
    .command("events")
    .description("List the stored events in feed order")
    .option("--json", "JSON output")
    .action(async (opts: { json?: boolean }) => {
      const table = await openTable();
      const snapshot = table.getSnapshot();
      if (opts.json) {
        io.stdout(JSON.stringify(snapshot, null, 2));
        return;
      }
      if (snapshot.events.length === 0) {
        io.stdout("no tidal events loaded");
      } else {
        printTable(io, [
          ["idx", "type", "time", "height_m"],
          ...snapshot.events.map((event, idx) => [
            String(idx),
            tideKind(event),
            formatEpoch(event.epochTime),
            event.heightM.toFixed(2),
          ]),
        ]);
      }
      io.stdout("");
      io.stdout(describeLoad(snapshot));
      if (snapshot.parseError) {
        io.stdout(`incomplete: ${snapshot.parseError}`);
      }
    });

  program
    .command("previous")
    .description("Most recent event at or before a time")
    .option("--at <time>", "now, an ISO timestamp or epoch seconds")
    .option("--json", "JSON output")
    .action(async (opts: QueryOptions) => {
      await renderNeighbour("previous", opts);
    });

  program
    .command("next")
    .description("First event strictly after a time")
    .option("--at <time>", "now, an ISO timestamp or epoch seconds")
    .option("--json", "JSON output")
    .action(async (opts: QueryOptions) => {
      await renderNeighbour("next", opts);
    });

  program
    .command("status")
    .description("Previous and next events with the time to each")
    .option("--at <time>", "now, an ISO timestamp or epoch seconds")
    .option("--json", "JSON output")
    .action(async (opts: QueryOptions) => {
      const table = await openTable();
      const status = table.status(queryTime(opts));
      if (opts.json) {
        io.stdout(JSON.stringify(status, null, 2));
        return;
      }
      io.stdout(`at        ${formatEpoch(status.at)}`);
      io.stdout(
        `previous  ${status.sincePrevious ? `${describeEvent(status.previous)} (${formatTimeSpan(status.sincePrevious)} ago)` : "none"}`,
      );
      io.stdout(`next      ${status.untilNext ? `${describeEvent(status.next)} (in ${formatTimeSpan(status.untilNext)})` : "none"}`);
    });

  const configCmd = program.command("config").description("Configuration");

  configCmd
    .command("get")
    .option("--json", "JSON output")
    .action(async (opts: { json?: boolean }) => {
      const config = await loadConfig(program.opts<GlobalOptions>().config);
      if (opts.json) {
        io.stdout(JSON.stringify(config, null, 2));
        return;
      }
      for (const line of flattenConfig(config)) io.stdout(line);
    });

  configCmd.command("set <key> <value>").action(async (key: string, value: string) => {
    const configPath = program.opts<GlobalOptions>().config;
    const config = await loadConfig(configPath);
    await saveConfig(setConfigValue(config, key, parseValue(value)), configPath);
    io.stdout(`updated ${key}`);
  });

  return program;
}
