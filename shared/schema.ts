export * from './models/scheduling';
