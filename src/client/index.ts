/**
 * Client entry points
 * @module dataverse-direct-upload/client
 */

export { DirectUploadClient } from './client.js';
export { createClient, type CreateClientOptions } from './factory.js';
