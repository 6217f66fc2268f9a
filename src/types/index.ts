export * from './document';
export * from './recommendation';
