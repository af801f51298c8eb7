export * from './types';
export * from './resolve';
export * from './provisioning-sequencer';
