import 'reflect-metadata';

export * from './common/hooks';
export * from './common/utils/random-string';
export * from './modules/mailer';
