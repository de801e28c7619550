import { describe, it, expect } from 'vitest';
import { RELOAD_MESSAGE, formatReloadMessage, parsePolicyEvent } from '../../../src/events/messages';

describe('Policy Event Messages', () => {
  it('should recognize the reload message', () => {
    expect(parsePolicyEvent(RELOAD_MESSAGE)).toEqual({ type: 'reload_permission' });
    expect(parsePolicyEvent('  RELOAD_POLICIES\n')).toEqual({ type: 'reload_permission' });
  });

  it('should carry the reason after a colon', () => {
    expect(parsePolicyEvent('RELOAD_POLICIES:role 3 changed')).toEqual({
      type: 'reload_permission',
      reason: 'role 3 changed',
    });
    expect(parsePolicyEvent('RELOAD_POLICIES:')).toEqual({ type: 'reload_permission' });
  });

  it('should not match other words sharing the prefix', () => {
    expect(parsePolicyEvent('RELOAD_POLICIES_NOW')).toBeNull();
  });

  it('should recognize JSON permission events', () => {
    expect(parsePolicyEvent('{"type":"add_permission"}')).toEqual({ type: 'add_permission' });
    expect(parsePolicyEvent('{"type":"remove_permission","reason":"cleanup","roleId":3}')).toEqual({
      type: 'remove_permission',
      reason: 'cleanup',
    });
  });

  it.each(['hello', '{"type":"grant"}', '{not json', '', '[1,2]'])('should ignore %j', (message) => {
    expect(parsePolicyEvent(message)).toBeNull();
  });

  it('should format reload messages', () => {
    expect(formatReloadMessage()).toBe('RELOAD_POLICIES');
    expect(formatReloadMessage('nightly sync')).toBe('RELOAD_POLICIES:nightly sync');
  });
});
