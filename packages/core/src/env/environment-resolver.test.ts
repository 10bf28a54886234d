import { describe, it, expect } from 'vitest';
import {
  EnvVarPatternResolver,
  EnvironmentResolutionError,
} from './environment-resolver.js';

describe('EnvVarPatternResolver', () => {
  describe('resolveDeep', () => {
    it('substitutes variables and defaults in nested objects and arrays', () => {
      const resolver = new EnvVarPatternResolver({
        envSource: { AUTH_HOST: 'https://login.example.com', SCOPE: 'openid' },
      });

      const result = resolver.resolveDeep({
        auth_server: '${AUTH_HOST}/oauth2/${REALM:default}',
        scopes: ['${SCOPE}', 'profile'],
        nested: { ttl: 30, enabled: true, name: null },
      });

      expect(result).toEqual({
        auth_server: 'https://login.example.com/oauth2/default',
        scopes: ['openid', 'profile'],
        nested: { ttl: 30, enabled: true, name: null },
      });
    });

    it('prefers a set variable over the default', () => {
      const resolver = new EnvVarPatternResolver({ envSource: { REALM: 'staff' } });

      expect(resolver.resolveDeep('${REALM:default}')).toBe('staff');
    });

    it('does not expand placeholders inside substituted values', () => {
      const resolver = new EnvVarPatternResolver({
        envSource: { OUTER: '${INNER}', INNER: 'in' },
      });

      expect(resolver.resolveDeep('${OUTER}')).toBe('${INNER}');
    });

    it('leaves lowercase and bare dollar forms alone', () => {
      const resolver = new EnvVarPatternResolver({ envSource: {} });

      expect(resolver.resolveDeep('$HOME ${lower}')).toBe('$HOME ${lower}');
    });

    it('names the unset variable', () => {
      const resolver = new EnvVarPatternResolver({ envSource: {} });

      expect(() => resolver.resolveDeep({ client_secret: '${CLIENT_SECRET}' })).toThrow(
        EnvironmentResolutionError,
      );
      try {
        resolver.resolveDeep('${CLIENT_SECRET}');
      } catch (error) {
        expect(error).toMatchObject({
          variable: 'CLIENT_SECRET',
          message: "Required environment variable 'CLIENT_SECRET' is not defined",
        });
      }
    });
  });
});
