export * from './receive-lot.dto';
