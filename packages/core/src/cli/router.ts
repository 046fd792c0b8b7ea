/**
 * Command router — maps argv[2] to a registered command by name or alias,
 * falling back to the default command.
 */

export interface CommandContext {
  argv: string[];
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

export interface Command {
  name: string;
  aliases?: string[];
  description: string;
  usage: string;
  run(ctx: CommandContext): Promise<number>;
}

export interface Router {
  register(command: Command): void;
  resolve(argv: string[]): { command: Command; rest: string[] };
  getCommands(): Command[];
  printHelp(stream: NodeJS.WritableStream): void;
}

export function createRouter(defaultCommand = 'list'): Router {
  const commands: Command[] = [];
  const byName = new Map<string, Command>();

  function getDefault(): Command {
    const command = byName.get(defaultCommand);
    if (!command) {
      throw new Error(`Default command "${defaultCommand}" not registered`);
    }
    return command;
  }

  return {
    register(command: Command): void {
      commands.push(command);
      byName.set(command.name, command);
      for (const alias of command.aliases ?? []) {
        byName.set(alias, command);
      }
    },

    resolve(argv: string[]): { command: Command; rest: string[] } {
      const args = argv.slice(2);
      const candidate = args[0];

      if (candidate !== undefined && !candidate.startsWith('-')) {
        const command = byName.get(candidate);
        if (command) return { command, rest: args.slice(1) };
      }

      return { command: getDefault(), rest: args };
    },

    getCommands(): Command[] {
      return [...commands];
    },

    printHelp(stream: NodeJS.WritableStream): void {
      const lines = commands.map((command) => {
        const names = [command.name, ...(command.aliases ?? [])].join(', ');
        return `  ${names.padEnd(20)} ${command.description}`;
      });
      stream.write(
        `\nUsage: audioshelf <command> [options]\n\nCommands:\n${lines.join('\n')}\n\n` +
          `Run 'audioshelf <command> --help' for command options.\n\n`
      );
    },
  };
}
