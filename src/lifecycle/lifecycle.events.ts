/**
 * Event emitted (with a LifecycleEvent payload) to feed the lifecycle queue.
 */
export const LIFECYCLE_EVENT = 'lifecycle.event';

export const LIFECYCLE_EVENTS = [
  'install',
  'config-changed',
  'certificate-requested',
  'renew-requested',
  'update-status',
] as const;

export type LifecycleEvent = (typeof LIFECYCLE_EVENTS)[number];

export function isLifecycleEvent(value: unknown): value is LifecycleEvent {
  return LIFECYCLE_EVENTS.some((event) => event === value);
}
