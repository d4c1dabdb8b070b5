import { Command } from 'commander';
import chalk from 'chalk';
import { resolveToken, setToken, getConfigPath } from '../config.js';
import { ThousandEyesConfigError } from '../errors.js';

function requireTokenKey(key: string): void {
  if (key !== 'token') {
    throw new ThousandEyesConfigError(`Unknown config key: ${key}. Supported: token`);
  }
}

export function maskToken(token: string): string {
  return '•'.repeat(Math.max(0, token.length - 4)) + token.slice(-4);
}

export function register(program: Command): void {
  const cmd = program
    .command('config')
    .description('Manage CLI configuration');

  cmd
    .command('set <key> <value>')
    .description('Set a config value (e.g., te config set token <token>)')
    .action((key: string, value: string) => {
      requireTokenKey(key);
      setToken(value);
      console.error(chalk.green(`Token saved to ${getConfigPath()}`));
    });

  cmd
    .command('get <key>')
    .description('Get a config value (e.g., te config get token)')
    .action((key: string) => {
      requireTokenKey(key);
      const token = resolveToken();
      if (token) {
        console.log(maskToken(token));
      } else {
        console.error(chalk.dim('No token configured.'));
      }
    });

  cmd
    .command('path')
    .description('Print config file location')
    .action(() => {
      console.log(getConfigPath());
    });
}
