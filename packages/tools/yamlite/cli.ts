import { pathToFileURL } from "node:url";
import { Command, CommanderError } from "commander";
import { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
import { YamlCodecService } from "./adapters/services/yaml-codec.ts";
import { type CommandDeps, createCommands } from "./adapters/cli/commands.ts";

// ============================================================================
// Version
// ============================================================================

const VERSION = "0.1.0";

function createCli(deps: CommandDeps): Command {
  const cli = new Command()
    .name("yl")
    .version(VERSION)
    .description("Read, query and rewrite YAML files")
    .exitOverride();

  for (const cmd of Object.values(createCommands(deps))) {
    cli.addCommand(cmd.exitOverride());
  }
  return cli;
}

export async function main(
  args: string[],
  deps: Partial<CommandDeps> = {},
): Promise<void> {
  const exit = deps.exit ?? ((code: number) => process.exit(code));
  const cli = createCli({
    fs: deps.fs ?? new NodeFileSystem(),
    yamlService: deps.yamlService ?? new YamlCodecService(),
    exit,
    stdin: deps.stdin,
  });

  try {
    await cli.parseAsync(args, { from: "user" });
  } catch (e) {
    // Usage errors were already printed by commander
    if (e instanceof CommanderError) {
      exit(e.exitCode);
      return;
    }
    throw e;
  }
}

// Run if executed directly
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  await main(process.argv.slice(2));
}
