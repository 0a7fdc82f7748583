import yargs from "yargs";
import { describeFailure } from "./cli-error";
import { evalSchema, runDiff, runEval, runSample, sampleSchema } from "./commands";

/**
 * Where the CLI writes and how it exits. Tests pass collectors instead of the
 * console and process.
 */
export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
  exit: (code: number) => void;
}

export const processIo: CliIo = {
  out: line => console.log(line),
  err: line => console.error(line),
  exit: code => process.exit(code),
};

/**
 * Runs a command body and reports its failure. Input errors print only their
 * message; anything else prints the message too, never a stack.
 */
async function report(io: CliIo, body: () => void): Promise<void> {
  try {
    body();
  } catch (err) {
    const failure = describeFailure(err);
    if (failure) {
      io.err(failure.message);
      io.exit(failure.exitCode);
      return;
    }
    io.err(err instanceof Error ? err.message : String(err));
    io.exit(1);
  }
}

export async function runCli(args: readonly string[], io: CliIo = processIo): Promise<void> {
  const terminalWidth = typeof process.stdout.columns === "number" ? process.stdout.columns : 120;

  await yargs([...args])
    .scriptName("autodiff")
    .usage("$0 <command> [options]")
    .strict()
    .demandCommand(1, "Specify a command.")
    .option("verbose", {
      type: "boolean",
      describe: "Log every node as it is computed (same as VERBOSE=true).",
      default: false,
    })
    .command(
      "eval <expression>",
      "Evaluate an expression.",
      cmd => cmd
        .positional("expression", { type: "string", demandOption: true, describe: "Infix expression, e.g. \"x * x + 3\"." })
        .option("at", { type: "string", array: true, describe: "Variable binding name=value (repeatable)." }),
      async argv => {
        await report(io, () => io.out(runEval(evalSchema.parse(argv), io.err)));
      }
    )
    .command(
      "diff <expression>",
      "Total derivative of an expression (every variable has derivative 1).",
      cmd => cmd
        .positional("expression", { type: "string", demandOption: true })
        .option("at", { type: "string", array: true, describe: "Variable binding name=value (repeatable)." }),
      async argv => {
        await report(io, () => io.out(runDiff(evalSchema.parse(argv), io.err)));
      }
    )
    .command(
      "sample <expression>",
      "Tabulate f(x) and f'(x) on evenly spaced points.",
      cmd => cmd
        .positional("expression", { type: "string", demandOption: true })
        .option("var", { type: "string", demandOption: true, describe: "Variable to sweep." })
        .option("from", { type: "number", demandOption: true, describe: "First sample point." })
        .option("to", { type: "number", demandOption: true, describe: "Last sample point." })
        .option("count", { type: "number", default: 11, describe: "Number of points, both ends included." })
        .option("at", { type: "string", array: true, describe: "Bindings for the other variables." })
        .option("json", { type: "boolean", default: false, describe: "Emit a JSON array of points." }),
      async argv => {
        await report(io, () => {
          for (const line of runSample(sampleSchema.parse(argv), io.err)) {
            io.out(line);
          }
        });
      }
    )
    .fail((msg, err, instance) => {
      if (msg) {
        io.err(msg);
      }
      if (err) {
        io.err(err.message);
      }
      instance.showHelp();
      io.exit(1);
    })
    .help()
    .wrap(Math.min(terminalWidth, 120))
    .parseAsync();
}
