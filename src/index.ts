/**
 * Direct upload of local files into Dataverse datasets
 * @module dataverse-direct-upload
 *
 * Bulk bytes go straight to object storage through pre-signed URLs issued by
 * the repository's API; the repository only allocates, finalizes and registers.
 */

export * from './errors/index.js';
export * from './config/index.js';
export * from './observability/index.js';
export * from './resilience/index.js';
export * from './chunking/index.js';
export * from './transport/index.js';
export * from './direct-upload/index.js';
export * from './upload/index.js';
export * from './client/index.js';
