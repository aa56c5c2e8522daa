export * from './hook-event';
export * from './hook.types';
export * from './hook';
