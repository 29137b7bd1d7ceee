import { Command } from 'commander';
import chalk from 'chalk';
import open from 'open';
import express from 'express';
import { AppContext } from '../context';
import { CommandBuilder } from '../utils/command-builder';
import { Logger } from '../utils/logger';

const AUTH_TIMEOUT_MS = 10 * 60 * 1000;

function page(title: string, body: string): string {
  return `
    <html>
      <body style="font-family: sans-serif; padding: 20px; text-align: center;">
        <h1>${title}</h1>
        <p>${body}</p>
        <p>You can close this window.</p>
      </body>
    </html>
  `;
}

function queryValue(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createAuthCommand(ctx: AppContext) {
  const cmd = new Command('auth')
    .description('Authenticate with Spotify (OAuth with PKCE)')
    .action(async () => {
      const spinner = CommandBuilder.createSpinner();

      try {
        spinner.text = 'Initializing Spotify OAuth flow...';
        const oauthService = ctx.oauth();
        const { url, codeVerifier, state } = oauthService.getAuthorizationUrl();
        const callback = new URL(ctx.config.spotify.redirectUri);
        const port = Number(callback.port || '80');

        const app = express();
        let authComplete = false;

        const server = app.listen(port, callback.hostname, () => {
          spinner.succeed(CommandBuilder.formatSuccess(`Waiting for the authorization callback on ${callback.origin}`));
          console.log(chalk.cyan('Opening browser for Spotify authorization...'));
          console.log(chalk.gray(`If nothing opens, visit: ${url}`));
        });

        const finish = (success: boolean) => {
          authComplete = success;
          setTimeout(() => server.close(), 500);
        };

        app.get(callback.pathname, async (req, res) => {
          const code = queryValue(req.query.code);
          const returnedState = queryValue(req.query.state);
          const error = queryValue(req.query.error);

          if (error) {
            spinner.fail(CommandBuilder.formatError(`Spotify authorization denied: ${error}`));
            res.send(page('Authorization Denied', 'You denied the authorization request.'));
            finish(false);
            return;
          }

          if (returnedState !== state) {
            spinner.fail(CommandBuilder.formatError('Security error: state mismatch'));
            res.status(403).send(page('Error', 'Security validation failed.'));
            finish(false);
            return;
          }

          if (!code) {
            spinner.fail(CommandBuilder.formatError('No authorization code received'));
            res.status(400).send(page('Error', 'No authorization code received. Please try again.'));
            finish(false);
            return;
          }

          try {
            spinner.start('Exchanging code for access token...');
            const token = await oauthService.exchangeCodeForToken(code, codeVerifier);
            await ctx.tokens.save(token);

            spinner.succeed(CommandBuilder.formatSuccess('Authentication successful!'));
            console.log(chalk.gray(`   Token valid until ${new Date(token.expiresAt).toLocaleString()}`));
            res.send(page('Success!', 'Spotify authentication completed.'));
            finish(true);
          } catch (exchangeError) {
            const message = CommandBuilder.describeError(exchangeError);
            spinner.fail(CommandBuilder.formatError(`Failed to exchange code for token: ${message}`));
            res.status(500).send(page('Error', 'Authentication failed. Check the terminal for details.'));
            finish(false);
          }
        });

        await open(url);

        await new Promise<void>((resolve) => {
          const timeout = setTimeout(() => {
            spinner.warn(CommandBuilder.formatWarning('Authentication timeout (10 minutes) - closing server'));
            server.close();
            resolve();
          }, AUTH_TIMEOUT_MS);

          server.on('close', () => {
            clearTimeout(timeout);
            resolve();
          });

          server.on('error', (err: Error) => {
            spinner.fail(CommandBuilder.formatError(`Server error: ${err.message}`));
            clearTimeout(timeout);
            resolve();
          });
        });

        process.exit(authComplete ? 0 : 1);
      } catch (error) {
        spinner.fail(CommandBuilder.formatError(`Authentication error: ${CommandBuilder.describeError(error)}`));
        if (error instanceof Error) {
          Logger.error('Authentication failed', error);
        }
        process.exit(1);
      }
    });

  return cmd;
}
