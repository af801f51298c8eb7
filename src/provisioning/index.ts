export * from './types';
export * from './errors';
export * from './exec';
export * from './azure-cli';
export * from './base-manager';
export * from './extension-manager';
export * from './session-manager';
export * from './resource-group-manager';
export * from './vm-manager';
export * from './network-manager';
export * from './workspace-manager';
export * from './azure-provider';
