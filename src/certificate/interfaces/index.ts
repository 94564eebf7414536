export * from './certificate-config.interface';
