/**
 * CLI commands for yamlite.
 *
 * Wires commander commands to use cases, adapters, and formatters.
 * Each command: read file -> call use case -> write file (if mutation) -> format output.
 */

import { Command } from "commander";
import { fromPlain } from "../../codec/plain.ts";
import { resolveConfig } from "../../config.ts";
import { reasonOf, YamlError } from "../../domain/entities/errors.ts";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import type { YamlService } from "../../domain/ports/yaml-service.ts";
import { ReadDocumentUseCase } from "../../domain/use-cases/read-document.ts";
import { WriteDocumentUseCase } from "../../domain/use-cases/write-document.ts";
import { ModifyDocumentUseCase } from "../../domain/use-cases/modify-document.ts";
import { ManageKeysUseCase } from "../../domain/use-cases/manage-keys.ts";
import {
  formatMutation,
  formatRewrite,
  jsonKey,
  jsonMutation,
  jsonTree,
} from "./formatter.ts";

// ============================================================================
// Helpers
// ============================================================================

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new YamlError("invalid_args", `Invalid JSON: ${reasonOf(e)}`);
  }
}

function indentFrom(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  return resolveConfig({ indentWidth: Number(raw) }).indentWidth;
}

// ============================================================================
// Dependencies container
// ============================================================================

export interface CommandDeps {
  fs: FileSystem;
  yamlService: YamlService;
  exit: (code: number) => void;
  stdin?: () => Promise<string>;
}

interface JsonOption {
  json?: boolean;
}

interface IndentOption {
  indent?: string;
}

// ============================================================================
// Command factories
// ============================================================================

export function createCommands(deps: CommandDeps) {
  const { fs, yamlService, exit } = deps;
  const stdin = deps.stdin ?? readStdin;

  // Instantiate use cases
  const readDocument = new ReadDocumentUseCase(fs, yamlService);
  const writeDocument = new WriteDocumentUseCase(fs, yamlService);
  const modifyDocument = new ModifyDocumentUseCase(readDocument, writeDocument);
  const manageKeys = new ManageKeysUseCase(yamlService);

  function handleError(e: unknown): void {
    if (e instanceof YamlError) {
      console.error(e.format());
      exit(1);
      return;
    }
    throw e;
  }

  // ========================================================================
  // Command implementations
  // ========================================================================

  async function cmdParse(words: string[]): Promise<string> {
    const text = words.length > 0 ? words.join(" ") : await stdin();
    return jsonTree(yamlService.parse(text));
  }

  async function cmdEncode(
    words: string[],
    indent: string | undefined,
  ): Promise<string> {
    const indentWidth = indentFrom(indent);
    const text = words.length > 0 ? words.join(" ") : await stdin();
    const data = parseJson(text);
    return yamlService.stringify(fromPlain(data), { indentWidth });
  }

  async function cmdRead(file: string): Promise<string> {
    const tree = await readDocument.execute({ path: file });
    return jsonTree(tree);
  }

  async function cmdFmt(
    file: string,
    indent: string | undefined,
  ): Promise<string> {
    const indentWidth = indentFrom(indent);
    await modifyDocument.execute({
      path: file,
      mutator: (tree) => tree,
      options: { indentWidth },
    });
    return formatRewrite(file);
  }

  async function cmdGet(
    file: string,
    key: string,
    json: boolean,
  ): Promise<string> {
    const tree = await readDocument.execute({ path: file });
    const { value, formatted } = manageKeys.get({ tree, key });
    if (json) {
      return jsonKey(key, value);
    }
    return formatted;
  }

  async function cmdSet(
    file: string,
    key: string,
    value: string,
    json: boolean,
  ): Promise<string> {
    await modifyDocument.execute({
      path: file,
      mutator: (tree) => manageKeys.set({ tree, key, value }).tree,
    });
    return json ? jsonMutation("set", key, file) : formatMutation("set", key);
  }

  async function cmdDel(
    file: string,
    key: string,
    json: boolean,
  ): Promise<string> {
    await modifyDocument.execute({
      path: file,
      mutator: (tree) => manageKeys.delete({ tree, key }).tree,
    });
    return json
      ? jsonMutation("deleted", key, file)
      : formatMutation("deleted", key);
  }

  // ========================================================================
  // commander command objects
  // ========================================================================

  const parseCmd = new Command("parse")
    .description("Parse YAML text and print it as JSON")
    .argument("[text...]", "YAML text (read from stdin when omitted)")
    .action(async (text: string[]) => {
      try {
        const output = await cmdParse(text);
        console.log(output);
      } catch (e) {
        handleError(e);
      }
    });

  const encodeCmd = new Command("encode")
    .description("Encode a JSON value as YAML")
    .argument("[json...]", "JSON text (read from stdin when omitted)")
    .option("--indent <n>", "Spaces per nesting level")
    .action(async (json: string[], options: IndentOption) => {
      try {
        const output = await cmdEncode(json, options.indent);
        console.log(output);
      } catch (e) {
        handleError(e);
      }
    });

  const readCmd = new Command("read")
    .description("Decode a YAML file and print it as JSON")
    .argument("<file>")
    .action(async (file: string) => {
      try {
        const output = await cmdRead(file);
        console.log(output);
      } catch (e) {
        handleError(e);
      }
    });

  const fmtCmd = new Command("fmt")
    .description("Rewrite a YAML file in canonical form")
    .argument("<file>")
    .option("--indent <n>", "Spaces per nesting level")
    .action(async (file: string, options: IndentOption) => {
      try {
        const output = await cmdFmt(file, options.indent);
        console.log(output);
      } catch (e) {
        handleError(e);
      }
    });

  const getCmd = new Command("get")
    .description("Print the value at a dot-separated key")
    .argument("<file>")
    .argument("<key>")
    .option("--json", "Output as JSON")
    .action(async (file: string, key: string, options: JsonOption) => {
      try {
        const output = await cmdGet(file, key, options.json ?? false);
        if (output) console.log(output);
      } catch (e) {
        handleError(e);
      }
    });

  const setCmd = new Command("set")
    .description("Set the value at a dot-separated key")
    .argument("<file>")
    .argument("<key>")
    .argument("<value>")
    .option("--json", "Output as JSON")
    .action(
      async (file: string, key: string, value: string, options: JsonOption) => {
        try {
          const output = await cmdSet(file, key, value, options.json ?? false);
          console.log(output);
        } catch (e) {
          handleError(e);
        }
      },
    );

  const delCmd = new Command("del")
    .description("Delete the value at a dot-separated key")
    .argument("<file>")
    .argument("<key>")
    .option("--json", "Output as JSON")
    .action(async (file: string, key: string, options: JsonOption) => {
      try {
        const output = await cmdDel(file, key, options.json ?? false);
        console.log(output);
      } catch (e) {
        handleError(e);
      }
    });

  return {
    parseCmd,
    encodeCmd,
    readCmd,
    fmtCmd,
    getCmd,
    setCmd,
    delCmd,
  };
}
