/**
 * Direct upload protocol operations
 * @module dataverse-direct-upload/direct-upload
 */

export type {
  CompletedPart,
  DatasetFile,
  DirectUploadService,
  FileRegistration,
  MultipartUploadTicket,
  RegisteredFile,
  SingleUploadTicket,
  UploadTicket,
} from './interface.js';

export {
  DataverseDirectUploadService,
  buildJsonData,
  TICKET_ENDPOINT,
  ADD_FILE_ENDPOINT,
  REPLACE_FILE_ENDPOINT,
  LIST_FILES_ENDPOINT,
  type DatasetTarget,
} from './service.js';

export { parseUploadTicket } from './tickets.js';
export { validatePartsSequence, buildCompletionBody } from './parts.js';
