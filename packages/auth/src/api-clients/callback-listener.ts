/**
 * Loopback HTTP listener receiving the authorization code redirect.
 */
import { createServer, type ServerResponse } from 'http';
import { logEvent } from '@credgate/core';
import { LoginError, OidcProtocolError, toError } from '../errors/index.js';
import { DEFAULT_LOGIN_TIMEOUT_SECONDS } from '../constants.js';

export const DEFAULT_CALLBACK_ACKNOWLEDGEMENT = `<!DOCTYPE html>
<html>
<head><meta charset="utf-8"><title>Login Successful</title></head>
<body>
  <h1>Login Successful</h1>
  <p>You can close this window and return to your application.</p>
</body>
</html>`;

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

const errorHtml = (error: string, description?: string): string => `<!DOCTYPE html>
<html>
<head><meta charset="utf-8"><title>Login Failed</title></head>
<body>
  <h1>Login Failed</h1>
  <p>${escapeHtml(description || 'An error occurred during authentication.')}</p>
  <pre>${escapeHtml(error)}</pre>
</body>
</html>`;

function respond(res: ServerResponse, status: number, html: string): void {
  res.writeHead(status, {
    'Content-Type': 'text/html; charset=utf-8',
    Connection: 'close',
  });
  res.end(html);
}

/**
 * @public
 */
export interface CallbackListenerParams {
  /** Loopback URI to listen on. Port `0` picks a free port. */
  listenUri: string;
  expectedState: string;
  timeoutSeconds?: number;
  /** HTML returned to the browser after a successful redirect. */
  acknowledgementHtml?: string;
  /**
   * Runs once the listener accepts connections, with the URI actually bound.
   * A rejection aborts the wait.
   */
  onListening?: (boundUri: string) => Promise<void> | void;
}

/**
 * Listens for one authorization redirect and resolves with its `code`.
 *
 * Only the listen URI's path is handled; anything else gets a 404 and the
 * listener keeps waiting. An `error` parameter rejects with
 * {@link OidcProtocolError}; a missing code or a state mismatch rejects with
 * {@link LoginError}. The listener closes once the wait settles.
 * @public
 */
export function waitForAuthorizationCallback(
  params: CallbackListenerParams,
): Promise<string> {
  const listenUrl = new URL(params.listenUri);
  const timeoutSeconds = params.timeoutSeconds ?? DEFAULT_LOGIN_TIMEOUT_SECONDS;
  const hostname = listenUrl.hostname.replace(/^\[|\]$/g, '');

  return new Promise<string>((resolve, reject) => {
    let settled = false;

    const server = createServer((req, res) => {
      const url = new URL(req.url ?? '/', listenUrl);

      if (url.pathname !== listenUrl.pathname) {
        res.writeHead(404, { 'Content-Type': 'text/plain' });
        res.end('Not Found');
        return;
      }

      const error = url.searchParams.get('error');
      if (error) {
        const errorDescription = url.searchParams.get('error_description') || undefined;
        respond(res, 400, errorHtml(error, errorDescription));
        finish(
          new OidcProtocolError({
            errorCode: error,
            errorDescription,
            status: 400,
            endpoint: params.listenUri,
          }),
        );
        return;
      }

      const code = url.searchParams.get('code');
      if (!code) {
        respond(res, 400, errorHtml('missing_code', 'No authorization code was received'));
        finish(new LoginError('No authorization code received'));
        return;
      }

      if (url.searchParams.get('state') !== params.expectedState) {
        respond(res, 400, errorHtml('invalid_state', 'State parameter mismatch'));
        finish(LoginError.stateMismatch());
        return;
      }

      respond(res, 200, params.acknowledgementHtml ?? DEFAULT_CALLBACK_ACKNOWLEDGEMENT);
      finish(undefined, code);
    });

    const timer = setTimeout(() => {
      finish(LoginError.timedOut('Authorization code', timeoutSeconds));
    }, timeoutSeconds * 1000);

    function finish(error?: Error, code?: string): void {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      server.close();
      if (error || code === undefined) {
        reject(error ?? new LoginError('No authorization code received'));
      } else {
        resolve(code);
      }
    }

    server.on('error', (error) => {
      finish(
        new LoginError(`Callback listener failed: ${error.message}`, error),
      );
    });

    server.listen(Number(listenUrl.port || 80), hostname, () => {
      const address = server.address();
      const port =
        typeof address === 'object' && address !== null
          ? address.port
          : Number(listenUrl.port);
      const bound = new URL(listenUrl.toString());
      bound.port = String(port);
      const boundUri = bound.toString();
      logEvent('debug', 'auth:callback_listening', { uri: boundUri });

      Promise.resolve()
        .then(() => params.onListening?.(boundUri))
        .catch((error: unknown) => finish(toError(error)));
    });
  });
}
