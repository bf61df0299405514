import { Command, OutputConfiguration } from "commander";
import { z } from "zod";
import { ApplyMetadataOptions } from "../../apply-metadata/types";

const cliOptionsSchema = z.object({
  dir: z.string().optional(),
  files: z.array(z.string()).optional(),
  outdir: z.string(),
  suffix: z.string().default(""),
  cover: z.string().optional(),
  dryRun: z.boolean().default(false),
  yes: z.boolean().default(false),
});

/**
 * Builds the command-line program.
 * @param output - Overrides where commander writes help and errors
 */
export function buildProgram(output?: OutputConfiguration): Command {
  const program = new Command()
    .name("cover-tagger")
    .description(
      "Apply ordered JSON-array metadata entries to ordered media files using ffmpeg (supports per-item artwork via 'image').",
    )
    .argument("<json_file>", "Path to JSON file containing an array of metadata objects.")
    .option("--dir <dir>", "Directory containing media files to process (sorted by filename).")
    .option("--files <files...>", "Explicit list of input files (keeps given order).")
    .requiredOption("--outdir <dir>", "Output directory.")
    .option("--suffix <suffix>", "Optional suffix before extension, e.g. '_tagged'.", "")
    .option("--cover <path>", "Optional default cover image used when an entry has no 'image'.")
    .option("--dry-run", "Print ffmpeg commands but do not run them.", false)
    .option("-y, --yes", "Overwrite outputs if they exist.", false);

  if (output) {
    program.configureOutput(output);
  }
  return program;
}

/**
 * Parses user arguments (without the node and script entries) into run options.
 * Commander exits the process on invalid input unless exitOverride() was set.
 */
export function parseCliArguments(
  argv: string[],
  program: Command = buildProgram(),
): ApplyMetadataOptions {
  program.parse(argv, { from: "user" });

  const [jsonFile] = program.args;
  const opts = cliOptionsSchema.parse(program.opts());

  return {
    jsonFile,
    dir: opts.dir,
    files: opts.files,
    outDir: opts.outdir,
    suffix: opts.suffix,
    cover: opts.cover,
    dryRun: opts.dryRun,
    overwrite: opts.yes,
  };
}
