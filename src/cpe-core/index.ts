// cpe-core: pure logic for turning webinar attendance exports into CPE lists.
// No HTTP, no database, no file access.

export const CPE_CORE_VERSION = '0.1.0';

export * from './errors';
export * from './dates';
export * from './tables';
export * from './config';
export * from './timestamps';
export * from './timeline';
export * from './reconcile';
export * from './credit';
export * from './report';
export * from './pipeline';
