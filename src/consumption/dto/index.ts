export * from './consume.dto';
