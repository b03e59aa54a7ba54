export type CommandHandler = (args: string[]) => void | Promise<void>;

const commands = new Map<string, CommandHandler>();

export function registerCommand(name: string, handler: CommandHandler): void {
  commands.set(name, handler);
}

export async function routeCommand(argv: string[]): Promise<void> {
  const command = argv[0];
  const args = argv.slice(1);

  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  const handler = commands.get(command);
  if (!handler) {
    console.error(`Unknown command: ${command}`);
    console.error('Run "chat-ledger help" for available commands.');
    process.exitCode = 1;
    return;
  }

  await handler(args);
}

function printHelp(): void {
  console.log(`chat-ledger: chat-driven expense ledger with recurring bill reminders

Usage: chat-ledger <command> [options]

Commands:
  chat           Talk to the ledger (REPL, or one message inline)
  list           List ledger entries
  summary        Monthly totals by kind and category
  scheduler      Generate due bills and send due reminders (--watch to keep running)
  help           Show this help message

Options:
  --user=<id>    Chat user the command acts for (default: local)`);
}
