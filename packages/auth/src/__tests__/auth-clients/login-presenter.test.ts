import { describe, it, expect, afterEach, vi } from 'vitest';
import { ConsolePresenter } from '../../auth-clients/login-presenter.js';

describe('ConsolePresenter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function printed(spy: { mock: { calls: unknown[][] } }): string {
    return spy.mock.calls.map((call) => String(call[0])).join('\n');
  }

  it('should print the complete verification URL and the user code', async () => {
    const spy = vi.spyOn(console, 'info').mockImplementation(() => {});

    await new ConsolePresenter().showDeviceCode({
      userCode: 'WDJB-MJHT',
      verificationUri: 'https://login.example.com/activate',
      verificationUriComplete: 'https://login.example.com/activate?user_code=WDJB-MJHT',
      expiresInSeconds: 600,
    });

    const output = printed(spy);
    expect(output).toContain('https://login.example.com/activate?user_code=WDJB-MJHT');
    expect(output).toContain('WDJB-MJHT');
    expect(output).toContain('This code expires in 600 seconds.');
  });

  it('should print the authorization URL', async () => {
    const spy = vi.spyOn(console, 'info').mockImplementation(() => {});

    await new ConsolePresenter().showAuthorizationUrl('https://login.example.com/authorize?x=1');

    expect(printed(spy)).toContain('https://login.example.com/authorize?x=1');
  });
});
