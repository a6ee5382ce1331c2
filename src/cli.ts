/**
 * agp2fasta command line
 *
 * Usage: agp2fasta <scaffolds.agp> <components.fasta> [options]
 */

import type { WritableStream } from "node:stream/web";
import { type } from "arktype";
import { AgpError, isAgpRecordError } from "./errors";
import { agpToFasta } from "./operations/agp2fasta";

const CliOptionsSchema = type({
  agpPath: "string>0",
  componentsPath: "string>0",
  strict: "boolean",
  lineWidth: "number.integer>=0",
  "output?": "string>0",
});

export type CliOptions = typeof CliOptionsSchema.infer;

export type ParsedArguments =
  | { readonly kind: "run"; readonly options: CliOptions }
  | { readonly kind: "help" }
  | { readonly kind: "usage"; readonly message: string };

export const USAGE = `agp2fasta - build FASTA sequences from an AGP v2.1 file

Usage: agp2fasta <scaffolds.agp> <components.fasta> [options]

Writes one FASTA record per AGP object, filled from the component FASTA
(indexed through <components.fasta>.fai when present) and runs of N for gaps.

Options:
  --strict            Slice components by their begin/end columns and fail
                      when a range runs past its component
  --line-width N      Wrap sequence lines at N bases (default: 0, no wrapping)
  -o, --output FILE   Write to FILE instead of stdout
  -h, --help          Show this help message

Examples:
  agp2fasta scaffolds.agp contigs.fasta > scaffolds.fasta
  agp2fasta scaffolds.agp contigs.fasta --strict --line-width 80 -o scaffolds.fasta
`;

/**
 * Turn command line arguments into options
 */
export function parseArguments(args: readonly string[]): ParsedArguments {
  if (args.includes("--help") || args.includes("-h")) {
    return { kind: "help" };
  }

  const positional: string[] = [];
  const raw: Record<string, unknown> = { strict: false, lineWidth: 0 };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];
    if (arg === undefined) continue;

    switch (arg) {
      case "--strict":
        raw.strict = true;
        break;

      case "--line-width":
        if (nextArg === undefined) {
          return { kind: "usage", message: `${arg} requires a number of bases` };
        }
        raw.lineWidth = Number(nextArg);
        i++;
        break;

      case "--output":
      case "-o":
        if (nextArg === undefined) {
          return { kind: "usage", message: `${arg} requires a file path` };
        }
        raw.output = nextArg;
        i++;
        break;

      default:
        if (arg.startsWith("-") && arg !== "-") {
          return { kind: "usage", message: `Unknown option: ${arg}` };
        }
        positional.push(arg);
    }
  }

  if (positional.length !== 2) {
    return {
      kind: "usage",
      message: `expected an AGP file and a component FASTA file (got ${positional.length} arguments)`,
    };
  }

  const [agpPath, componentsPath] = positional;
  const validated = CliOptionsSchema({ ...raw, agpPath, componentsPath });
  if (validated instanceof type.errors) {
    return { kind: "usage", message: validated.summary };
  }
  return { kind: "run", options: validated };
}

function describeError(error: unknown): string {
  if (isAgpRecordError(error)) return error.describe();
  if (error instanceof AgpError) return error.toString();
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run the command and return its exit code
 *
 * 0 on success, 1 when assembly fails, 2 on bad arguments.
 */
export async function main(
  args: readonly string[],
  sink?: WritableStream<Uint8Array>
): Promise<number> {
  const parsed = parseArguments(args);

  switch (parsed.kind) {
    case "help":
      console.log(USAGE);
      return 0;

    case "usage":
      console.error(`Error: ${parsed.message}`);
      console.error("Run with --help for usage.");
      return 2;

    case "run": {
      const { agpPath, componentsPath, strict, lineWidth, output } = parsed.options;
      try {
        await agpToFasta(agpPath, componentsPath, {
          strict,
          lineWidth,
          ...(output !== undefined && { output }),
          ...(sink !== undefined && { sink }),
        });
        return 0;
      } catch (error) {
        console.error(`Error: ${describeError(error)}`);
        return 1;
      }
    }
  }
}
