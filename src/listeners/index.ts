export * from './unique-id-tracking';
