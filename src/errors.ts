import chalk from 'chalk';

export class ThousandEyesCliError extends Error {
  constructor(message: string, public readonly exitCode: number = 1) {
    super(message);
    this.name = new.target.name;
  }

  display(): string {
    return chalk.red(`Error: ${this.message}`);
  }
}

export class ThousandEyesApiError extends ThousandEyesCliError {
  constructor(
    public readonly statusCode: number,
    public readonly body: string
  ) {
    super(`ThousandEyes API Error: ${statusCode} - ${body}`, exitCodeForStatus(statusCode));
  }

  display(): string {
    return [
      chalk.red(`Error: request failed (${this.statusCode})`),
      chalk.dim(`  Body: ${this.body || '<empty>'}`),
    ].join('\n');
  }
}

export class ThousandEyesAuthError extends ThousandEyesCliError {
  constructor(message = 'No API token configured') {
    super(message, 2);
  }

  display(): string {
    return [
      chalk.red('Error: Authentication failed'),
      '',
      '  No bearer token found. Set one of:',
      `    1. ${chalk.cyan('TE_API_TOKEN')} environment variable (or .env file)`,
      `    2. ${chalk.cyan('te config set token <token>')}`,
      `    3. ${chalk.cyan('--token <token>')} flag`,
    ].join('\n');
  }
}

export class ThousandEyesConfigError extends ThousandEyesCliError {
  constructor(message: string) {
    super(message, 4);
  }
}

export class ThousandEyesNotFoundError extends ThousandEyesCliError {
  constructor(message: string) {
    super(message, 3);
  }
}

export class ThousandEyesWorkflowError extends ThousandEyesCliError {}

function exitCodeForStatus(statusCode: number): number {
  if (statusCode === 401 || statusCode === 403) return 2;
  if (statusCode === 404) return 3;
  if (statusCode === 400 || statusCode === 409) return 4;
  if (statusCode === 429) return 5;
  return 1;
}

/** Renders a failed request as `<status> - <body>`, or the transport error's message. */
export function describeFailure(err: unknown): string {
  if (err instanceof ThousandEyesApiError) {
    return `${err.statusCode} - ${err.body}`;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
