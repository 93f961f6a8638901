export * from './adjust-lot.dto';
