export { PasteDetails, pasteRecordSchema } from './paste.js';
export type { PasteDetailsInit, PasteRecord } from './paste.js';
export { UserDetails, userRecordSchema } from './user.js';
export type { UserDetailsInit, UserRecord } from './user.js';
