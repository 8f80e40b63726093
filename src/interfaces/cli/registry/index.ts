import { Command } from 'commander';
import { registerDiscordCommands } from './commands/discord';
import { registerMarketCommands } from './commands/market';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('token-marketcap-bot')
    .description('Token market cap chat bot')
    .version('1.0.0');

  registerDiscordCommands(program);
  registerMarketCommands(program);

  program.configureOutput({
    writeOut: str => process.stdout.write(str),
    writeErr: str => process.stderr.write(str),
  });

  return program;
}
