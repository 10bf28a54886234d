import { createInterface } from 'readline/promises';
import chalk from 'chalk';
import open from 'open';

/**
 * What a device code login shows the user.
 * @public
 */
export interface DeviceCodePrompt {
  userCode: string;
  verificationUri: string;
  verificationUriComplete?: string;
  expiresInSeconds: number;
}

/**
 * The user-facing side of interactive logins.
 * @public
 */
export interface LoginPresenter {
  showAuthorizationUrl(url: string): Promise<void>;
  showDeviceCode(prompt: DeviceCodePrompt): Promise<void>;
  promptForAuthorizationCode(url: string): Promise<string>;
  promptForUsername(): Promise<string>;
  promptForPassword(): Promise<string>;
}

export type BrowserOpener = (url: string) => Promise<void>;

/**
 * Opens a URL in the user's default browser.
 */
export const openInBrowser: BrowserOpener = async (url) => {
  await open(url);
};

/**
 * Presents logins on the process's terminal.
 * @public
 */
export class ConsolePresenter implements LoginPresenter {
  public async showAuthorizationUrl(url: string): Promise<void> {
    console.info(chalk.bold('\nPlease open this URL in your browser to authorize:'));
    console.info(chalk.cyan(url));
  }

  public async showDeviceCode(prompt: DeviceCodePrompt): Promise<void> {
    console.info(chalk.bold('\nTo finish logging in, visit:'));
    console.info(`  ${chalk.cyan(prompt.verificationUriComplete ?? prompt.verificationUri)}`);
    console.info(`and confirm the code: ${chalk.yellow.bold(prompt.userCode)}`);
    console.info(chalk.gray(`This code expires in ${prompt.expiresInSeconds} seconds.\n`));
  }

  public async promptForAuthorizationCode(url: string): Promise<string> {
    await this.showAuthorizationUrl(url);
    return this.ask('Authorization code: ');
  }

  public async promptForUsername(): Promise<string> {
    return this.ask('Username: ');
  }

  public async promptForPassword(): Promise<string> {
    return this.ask('Password: ');
  }

  private async ask(question: string): Promise<string> {
    const rl = createInterface({ input: process.stdin, output: process.stderr });
    try {
      return (await rl.question(question)).trim();
    } finally {
      rl.close();
    }
  }
}
