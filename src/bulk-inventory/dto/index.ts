export * from './adjust-bulk.dto';
export * from './record-acquisition.dto';
