#!/usr/bin/env node
import { config } from "./config/index.js";
import { processEmailFile } from "./processor/index.js";

function printUsage(): void {
  console.log(`
Usage: tsx src/cli.ts <file> [options]

Extracts sender, recipients, subject, body, CC and sent time from a .msg
or .eml file and writes its attachments to the output directory.

Options:
  --output <dir>                Attachment directory (default: ${config.output.dir})
  --help                        Show this message
`.trim());
}

function parseArgs(args: string[]): { positional: string[]; options: Record<string, string> } {
  const positional: string[] = [];
  const options: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith("--")) {
      const key = args[i].slice(2);
      const value = args[i + 1];
      if (value && !value.startsWith("--")) {
        options[key] = value;
        i++;
      } else {
        options[key] = "true";
      }
    } else {
      positional.push(args[i]);
    }
  }
  return { positional, options };
}

async function main(): Promise<void> {
  const { positional, options } = parseArgs(process.argv.slice(2));

  if (options.help) {
    printUsage();
    return;
  }

  const [filePath] = positional;
  if (!filePath || positional.length > 1) {
    printUsage();
    process.exit(1);
  }

  const result = await processEmailFile(filePath, { outputDir: options.output });
  console.log(JSON.stringify(result, null, 2));
}

main().catch((err) => {
  console.error("CLI error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
