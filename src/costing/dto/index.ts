export * from './estimate-cost.dto';
