/**
 * Tests for PolicyEngine
 */

import { PolicyEngine, PolicyUnavailableError, DEFAULT_POLICY_FILE } from '../src/index.js';

const USER_METHODS = ['/user.v1.UserService/GetUser', '/user.v1.UserService/GetCurrentUser'];
const ADMIN_ONLY_METHODS = [
  '/user.v1.UserService/CreateUser',
  '/user.v1.UserService/UpdateUser',
  '/user.v1.UserService/DeleteUser',
  '/user.v1.UserService/ListUsers'
];

describe('PolicyEngine', () => {
  describe('default policy file', () => {
    let engine: PolicyEngine;

    beforeAll(async () => {
      engine = await PolicyEngine.load();
    });

    it('loads from the package policy directory', () => {
      expect(DEFAULT_POLICY_FILE.endsWith('policy/rbac-policy.json')).toBe(true);
      expect(engine.available).toBe(true);
    });

    it.each(USER_METHODS)('allows user and admin to call %s', (method) => {
      expect(engine.isAllowed('user', method)).toBe(true);
      expect(engine.isAllowed('admin', method)).toBe(true);
    });

    it.each(ADMIN_ONLY_METHODS)('allows only admin to call %s', (method) => {
      expect(engine.isAllowed('user', method)).toBe(false);
      expect(engine.isAllowed('admin', method)).toBe(true);
    });
  });

  describe('patterns', () => {
    const engine = PolicyEngine.fromTable({
      roles: {
        user: ['/report.v1.ReportService/*', '/user.v1.UserService/GetUser']
      }
    });

    it('matches whole services', () => {
      expect(engine.isAllowed('user', '/report.v1.ReportService/Download')).toBe(true);
      expect(engine.isAllowed('user', '/report.v1.ReportServiceAdmin/Download')).toBe(false);
    });

    it('matches exact methods only', () => {
      expect(engine.isAllowed('user', '/user.v1.UserService/GetUser')).toBe(true);
      expect(engine.isAllowed('user', '/user.v1.UserService/GetUserSecrets')).toBe(false);
    });

    it('denies roles absent from the table', () => {
      expect(engine.isAllowed('admin', '/user.v1.UserService/GetUser')).toBe(false);
    });
  });

  it('rejects malformed tables', () => {
    expect(() => PolicyEngine.fromTable({ roles: { user: 'everything' } })).toThrow();
  });

  describe('load failure', () => {
    it('fails closed by default', async () => {
      const engine = await PolicyEngine.load({ file: '/nonexistent/rbac-policy.json' });

      expect(engine.available).toBe(false);
      expect(() => engine.isAllowed('admin', '/user.v1.UserService/GetUser')).toThrow(PolicyUnavailableError);
    });

    it('fails open only when asked to', async () => {
      const engine = await PolicyEngine.load({ file: '/nonexistent/rbac-policy.json', failOpen: true });

      expect(engine.available).toBe(false);
      expect(engine.isAllowed('user', '/user.v1.UserService/DeleteUser')).toBe(true);
    });
  });
});
