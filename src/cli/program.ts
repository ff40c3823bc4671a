/**
 * CLI Program
 *
 * Commander program exposing the sandbox verbs on the command line. Replies
 * go to stdout, diagnostics to stderr.
 */

import { Command, InvalidArgumentError } from "commander";
import * as fs from "fs/promises";
import * as os from "os";
import pc from "picocolors";
import { SandboxCommands, type SandboxCommandsOptions } from "../commands/service.js";
import { ConfigError, loadConfig, type SandboxConfig } from "../config/index.js";
import { Logger } from "../logging/logger.js";

export interface CLIOutput {
  out(text: string): void;
  err(text: string): void;
}

export interface ProgramDeps {
  output?: CLIOutput;
  loadConfig?: (configPath?: string) => Promise<SandboxConfig>;
  /** Extra options for the command service (tests inject a spawner here) */
  commandOptions?: SandboxCommandsOptions;
  /** Read piped input; undefined when stdin is a terminal */
  readStdin?: () => Promise<string | undefined>;
}

type GlobalOptions = {
  user: string;
  config?: string;
};

const processOutput: CLIOutput = {
  out: (text) => process.stdout.write(`${text}\n`),
  err: (text) => process.stderr.write(`${text}\n`),
};

async function readProcessStdin(): Promise<string | undefined> {
  if (process.stdin.isTTY) {
    return undefined;
  }
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

function defaultOwner(): string {
  return process.env.SANDBOX_USER ?? os.userInfo().username;
}

function parsePage(value: string): number {
  const page = Number.parseInt(value, 10);
  if (!Number.isInteger(page) || page < 1) {
    throw new InvalidArgumentError("Page must be a positive integer.");
  }
  return page;
}

/**
 * Highlight replies that report a failure.
 */
function paint(reply: string): string {
  if (/^(Sandbox error|Sandbox not ready|Failed|No sandbox|Invalid)/.test(reply)) {
    return pc.red(reply);
  }
  return reply;
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const output = deps.output ?? processOutput;
  const readStdin = deps.readStdin ?? readProcessStdin;
  const load = deps.loadConfig ?? ((configPath?: string) => loadConfig({ configPath }));

  const program = new Command();

  program
    .name("sandbox-sessions")
    .description("Per-user persistent workspaces with isolated Python execution")
    .version("0.1.0")
    .option("-u, --user <id>", "Session owner id", defaultOwner())
    .option("-c, --config <path>", "Config file (searched upward from cwd if not specified)");

  async function withCommands(action: (commands: SandboxCommands, owner: string) => Promise<void>): Promise<void> {
    const globals = program.opts<GlobalOptions>();
    let config: SandboxConfig;
    try {
      config = await load(globals.config);
    } catch (error) {
      if (error instanceof ConfigError) {
        output.err(pc.red(error.message));
        process.exitCode = 1;
        return;
      }
      throw error;
    }

    const commands = new SandboxCommands(config, {
      logger: Logger.create({ level: config.logLevel }),
      ...deps.commandOptions,
    });
    await action(commands, globals.user);
  }

  async function textInput(inline: string[], file?: string): Promise<string | undefined> {
    if (file) {
      return fs.readFile(file, "utf-8");
    }
    if (inline.length > 0) {
      return inline.join(" ");
    }
    return readStdin();
  }

  program
    .command("create")
    .description("Create your sandbox")
    .action(() =>
      withCommands(async (commands, owner) => {
        output.out(paint(await commands.create(owner)));
      })
    );

  program
    .command("py")
    .description("Run Python code in your sandbox")
    .argument("[code...]", "Code to run (reads stdin if omitted)")
    .option("-f, --file <path>", "Read code from a local file")
    .action((code: string[], options: { file?: string }) =>
      withCommands(async (commands, owner) => {
        const source = await textInput(code, options.file);
        if (source === undefined || source.trim() === "") {
          output.err(pc.red("No code given."));
          process.exitCode = 1;
          return;
        }
        await commands.prepareRuntime();
        output.out(paint(await commands.run(owner, source)));
      })
    );

  program
    .command("look")
    .description("Change into a directory and list it")
    .argument("[path]", "Directory relative to the current one")
    .option("-p, --page <n>", "Page of the listing", parsePage, 1)
    .action((path: string | undefined, options: { page: number }) =>
      withCommands(async (commands, owner) => {
        output.out(paint(await commands.look(owner, { path, page: options.page - 1 })));
      })
    );

  program
    .command("write")
    .description("Create or overwrite a file")
    .argument("<name>", "File name relative to the current directory")
    .argument("[content...]", "File content (reads stdin if omitted)")
    .option("-f, --file <path>", "Copy content from a local file")
    .action((name: string, content: string[], options: { file?: string }) =>
      withCommands(async (commands, owner) => {
        const text = (await textInput(content, options.file)) ?? "";
        output.out(paint(await commands.write(owner, name, text)));
      })
    );

  program
    .command("rm")
    .description("Remove a file or directory")
    .argument("<name>", "Path relative to the current directory")
    .option("-r, --recursive", "Remove directories recursively", false)
    .action((name: string, options: { recursive: boolean }) =>
      withCommands(async (commands, owner) => {
        output.out(paint(await commands.rm(owner, name, options.recursive)));
      })
    );

  program
    .command("pip")
    .description("Install Python packages into your sandbox")
    .argument("<packages...>", "Package names")
    .action((packages: string[]) =>
      withCommands(async (commands, owner) => {
        await commands.prepareRuntime();
        let last: string | undefined;
        for await (const status of commands.install(owner, packages.join(" "))) {
          if (last !== undefined) {
            output.err(pc.dim(last));
          }
          last = status;
        }
        if (last !== undefined) {
          output.out(paint(last));
        }
      })
    );

  program
    .command("delete")
    .description("Delete your sandbox and all files")
    .action(() =>
      withCommands(async (commands, owner) => {
        output.out(paint(await commands.delete(owner)));
      })
    );

  program
    .command("health")
    .description("Check that Docker and the image are available")
    .action(() =>
      withCommands(async (commands) => {
        const reply = await commands.health();
        output.out(reply.startsWith("Docker reachable") ? pc.green(reply) : pc.red(reply));
      })
    );

  return program;
}

export async function runCLI(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}
