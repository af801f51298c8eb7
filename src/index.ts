// Main entry point for az-provision
export * from './types';
export * from './config';
export * from './provisioning';
export * from './orchestration';

