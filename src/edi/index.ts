// Module
export * from './edi.module';
export * from './edi.controller';

// Interfaces
export * from './interfaces/edi.interfaces';
export * from './errors/edi.errors';

// Config
export * from './config/edi.config';

// Services
export * from './services/description-normalizer';
export * from './services/segment-tree';
export * from './services/usage-consolidator';
export * from './services/format-detector.service';
export * from './services/faurecia-table-parser.service';
export * from './services/vda4932-table-parser.service';
export * from './services/segment-enricher.service';
export * from './services/statistics.service';
export * from './services/edi-extractor.service';
export * from './services/edi-export.service';
export * from './services/batch-extraction.service';
