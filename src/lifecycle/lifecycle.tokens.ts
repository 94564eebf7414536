export const LIFECYCLE_CONFIG = Symbol('LIFECYCLE_CONFIG');
