export const RENEWAL_CONFIG = Symbol('RENEWAL_CONFIG');
