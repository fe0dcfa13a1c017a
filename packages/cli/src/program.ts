/**
 * orbitrag command-line program
 *
 * Every invocation opens one session, loads the given documents into it and
 * runs a single command against it.
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import {
  COMPLETION_ERROR_PREFIX,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_TOP_K,
  ask,
  describeError,
  init,
  logger,
  stats,
  toLoadResult,
  type Session,
  type SessionOptions,
} from "@orbitrag/sdk";
import { resolveConfig, isVerbose } from "./lib/env.js";
import {
  parseEndpoint,
  parseLevel,
  parseNonNegativeInt,
  parsePositiveInt,
  parseTimeout,
} from "./lib/arg.js";
import { processIO, type CliIO } from "./lib/io.js";
import { describeLoad, describeStats, renderJson, renderLines } from "./lib/render.js";
import { CliError, formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { Telemetry } from "./lib/telemetry.js";

interface GlobalOptions {
  endpoint?: string;
  apiKey?: string;
  model?: string;
  level?: number;
  timeout?: number;
  json?: boolean;
  verbose?: boolean;
}

interface SourceOptions {
  file?: string[];
}

interface LoadCommandOptions extends SourceOptions {
  chunkSize: number;
}

interface SearchCommandOptions extends SourceOptions {
  topK: number;
}

interface AskCommandOptions extends SearchCommandOptions {
  memory: boolean;
}

export interface ProgramDeps {
  io?: CliIO;
  env?: NodeJS.ProcessEnv;
  /** Preconfigured HTTP client for the completion endpoint */
  http?: SessionOptions["http"];
}

interface LoadedDocument {
  source: string;
  text: string;
}

function readVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const packageJson: unknown = JSON.parse(readFileSync(join(here, "../package.json"), "utf-8"));
  if (typeof packageJson === "object" && packageJson !== null && "version" in packageJson) {
    return String(packageJson.version);
  }
  return "0.0.0";
}

/**
 * Build the commander program
 */
export function createProgram(deps: ProgramDeps = {}): Command {
  const io = deps.io ?? processIO;
  const env = deps.env ?? process.env;
  const program = new Command();

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();
  const telemetry = (): Telemetry =>
    new Telemetry((globals().verbose ?? false) || isVerbose(env), io.stderr);

  const openSession = (): Session => {
    const opts = globals();
    if (opts.verbose) {
      logger.setThreshold("debug");
    }
    const config = resolveConfig(
      {
        endpoint: opts.endpoint,
        apiKey: opts.apiKey,
        model: opts.model,
        level: opts.level,
        timeout: opts.timeout,
      },
      env
    );
    return init({ ...config, http: deps.http }).session;
  };

  const readDocuments = async (
    paths: string[],
    required: boolean
  ): Promise<LoadedDocument[]> => {
    if (paths.length > 0) {
      const documents: LoadedDocument[] = [];
      for (const source of paths) {
        try {
          documents.push({ source, text: await io.readFile(source) });
        } catch (err) {
          throw new CliError(`Cannot read ${source}: ${describeError(err)}`, { cause: err });
        }
      }
      return documents;
    }

    if (!io.isStdinTTY()) {
      let text: string;
      try {
        text = await io.readStdin(); // Size limit enforced during streaming
      } catch (err) {
        throw new InvalidArgumentError(
          err instanceof Error ? err.message : "Failed to read from stdin"
        );
      }
      if (text.trim()) {
        return [{ source: "stdin", text }];
      }
      if (required) {
        throw new InvalidArgumentError("stdin is empty");
      }
      return [];
    }

    if (required) {
      throw new InvalidArgumentError(
        "No input provided. Pass files, use --file, or pipe text to stdin"
      );
    }
    return [];
  };

  const loadInto = async (session: Session, options: SourceOptions): Promise<void> => {
    for (const document of await readDocuments(options.file ?? [], false)) {
      session.load(document.text);
    }
  };

  // Commander output goes through the injected streams; errors are thrown, not exited
  program
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(str),
    })
    .exitOverride();

  // Global options
  program
    .name("orbitrag")
    .description("orbitrag - keyword retrieval in front of a completion endpoint")
    .version(readVersion())
    .option("--endpoint <url>", "Completion endpoint URL", (v) => parseEndpoint(v, "--endpoint"))
    .option("--api-key <key>", "Bearer credential for the endpoint")
    .option("--model <name>", "Model name sent with each request")
    .option("--level <n>", "State bank level", (v) => parseLevel(v, "--level"))
    .option("--timeout <ms>", "Request timeout in milliseconds", (v) => parseTimeout(v, "--timeout"))
    .option("--json", "Output as JSON for machine consumption")
    .option("--verbose", "Verbose diagnostics");

  // Init command
  program
    .command("init")
    .description("Show the session settings without loading anything")
    .action(async () => {
      await telemetry().withTiming("cli.init", async () => {
        const session = openSession();
        const info = {
          model: session.model,
          endpoint: session.client.endpoint,
          level: session.store.level,
          statesPerUnit: session.store.slotCount,
        };
        if (globals().json) {
          io.stdout(renderJson(info, { raw: true }));
        } else {
          io.stdout(
            renderLines([
              `Model: ${info.model}`,
              `Endpoint: ${info.endpoint}`,
              `Level: ${info.level}`,
              `States per unit: ${info.statesPerUnit}`,
            ])
          );
        }
      });
    });

  // Load command
  program
    .command("load [files...]")
    .description("Chunk, encode and index documents, then report the result")
    .option("--file <path...>", "Read documents from files")
    .option(
      "--chunk-size <n>",
      "Words per fragment",
      (v) => parsePositiveInt(v, "--chunk-size"),
      DEFAULT_CHUNK_SIZE
    )
    .action(async (files: string[], options: LoadCommandOptions) => {
      await telemetry().withTiming("cli.load", async () => {
        const documents = await readDocuments([...files, ...(options.file ?? [])], true);
        const session = openSession();

        const results = documents.map((document) => ({
          source: document.source,
          ...toLoadResult(session.load(document.text, options.chunkSize)),
        }));

        if (globals().json) {
          io.stdout(renderJson(results, { raw: true }));
        } else {
          io.stdout(renderLines(results.map((result) => describeLoad(result, result.source))));
        }
      });
    });

  // Search command
  program
    .command("search <query>")
    .description("Print the context retrieved for a query")
    .option("--file <path...>", "Documents to load first")
    .option(
      "-k, --top-k <n>",
      "Fragments to retrieve",
      (v) => parseNonNegativeInt(v, "--top-k"),
      DEFAULT_TOP_K
    )
    .action(async (query: string, options: SearchCommandOptions) => {
      await telemetry().withTiming("cli.search", async () => {
        const session = openSession();
        await loadInto(session, options);

        const context = session.search(query, options.topK);
        if (globals().json) {
          const { hits, fallback } = session.retriever.rank(query, options.topK);
          io.stdout(renderJson({ query, fallback, hits, context }, { raw: true }));
        } else if (context) {
          io.stdout(`${context}\n`);
        }
      });
    });

  // Ask command
  program
    .command("ask <question>")
    .description("Answer a question using retrieved context")
    .option("--file <path...>", "Documents to load first")
    .option(
      "-k, --top-k <n>",
      "Fragments placed in the prompt",
      (v) => parseNonNegativeInt(v, "--top-k"),
      DEFAULT_TOP_K
    )
    .option("--no-memory", "Send the bare question without retrieval")
    .action(async (question: string, options: AskCommandOptions) => {
      await telemetry().withTiming("cli.ask", async () => {
        const session = openSession();
        await loadInto(session, options);

        const answer = options.memory
          ? await ask(session, question, options.topK)
          : await session.ask(question, { useMemory: false });

        if (answer.startsWith(COMPLETION_ERROR_PREFIX)) {
          throw new CliError(`Completion failed: ${answer.slice(COMPLETION_ERROR_PREFIX.length)}`);
        }

        if (globals().json) {
          io.stdout(renderJson({ question, answer }, { raw: true }));
        } else {
          io.stdout(`${answer}\n`);
        }
      });
    });

  // Stats command
  program
    .command("stats")
    .description("Show session statistics after loading documents")
    .option("--file <path...>", "Documents to load first")
    .action(async (options: SourceOptions) => {
      await telemetry().withTiming("cli.stats", async () => {
        const session = openSession();
        await loadInto(session, options);

        const result = stats(session);
        if (globals().json) {
          io.stdout(renderJson(result, { raw: true }));
        } else if ("error" in result) {
          throw new CliError(result.error);
        } else {
          io.stdout(renderLines(describeStats(result)));
        }
      });
    });

  return program;
}

/**
 * Parse arguments (without the node and script entries) and run one command
 * @returns Process exit code
 */
export async function run(argv: string[], deps: ProgramDeps = {}): Promise<number> {
  const io = deps.io ?? processIO;
  const program = createProgram({ ...deps, io });

  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (err) {
    // Commander has already printed its own parse errors, help and version
    if (err instanceof CommanderError && !(err instanceof InvalidArgumentError)) {
      return err.exitCode;
    }

    const verbose = program.opts<GlobalOptions>().verbose ?? false;
    io.stderr(`Error: ${formatCliError(err, verbose)}\n`);
    return mapSdkErrorToExitCode(err);
  }
}
