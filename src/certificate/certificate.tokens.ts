export const CERTIFICATE_CONFIG = Symbol('CERTIFICATE_CONFIG');
