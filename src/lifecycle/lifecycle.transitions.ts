import type { LifecycleEvent } from './lifecycle.events';

/**
 * Conditions a transition guard may look at. Read fresh before every transition.
 */
export interface LifecycleFlags {
  installed: boolean;
  registered: boolean;
  /** The pending request queue is non-empty. */
  certificateRequested: boolean;
  fqdnConfigured: boolean;
  fqdnChanged: boolean;
  /** The configured fqdn's last issuance failed and awaits an explicit trigger. */
  fqdnFailed: boolean;
  renewRequested: boolean;
  renewalArmed: boolean;
  disabled: boolean;
  renewDisabled: boolean;
}

export type TransitionName = 'install' | 'reset-registration' | 'register' | 'restore-renewal-trigger' | 'renew';

export interface TransitionRule {
  name: TransitionName;
  /** Events that may fire the transition; 'all' for every event. */
  events: readonly LifecycleEvent[] | 'all';
  guard: (flags: LifecycleFlags) => boolean;
}

/**
 * The dispatch table, evaluated in order for every event.
 */
export const TRANSITIONS: readonly TransitionRule[] = [
  {
    name: 'install',
    events: 'all',
    guard: (flags) => !flags.installed,
  },
  {
    name: 'reset-registration',
    events: ['config-changed'],
    guard: (flags) => flags.fqdnChanged,
  },
  {
    name: 'register',
    events: 'all',
    guard: (flags) =>
      flags.installed &&
      !flags.disabled &&
      ((!flags.registered && flags.fqdnConfigured && !flags.fqdnFailed) || flags.certificateRequested),
  },
  {
    name: 'restore-renewal-trigger',
    events: 'all',
    guard: (flags) => flags.installed && flags.registered && !flags.renewalArmed && !flags.renewDisabled,
  },
  {
    name: 'renew',
    events: 'all',
    guard: (flags) =>
      flags.installed && flags.registered && flags.renewRequested && !flags.disabled && !flags.renewDisabled,
  },
];

export function handlesEvent(rule: TransitionRule, event: LifecycleEvent): boolean {
  return rule.events === 'all' || rule.events.includes(event);
}

