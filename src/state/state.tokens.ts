export const STATE_CONFIG = Symbol('STATE_CONFIG');
