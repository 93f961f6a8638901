export * from './record-production.dto';
