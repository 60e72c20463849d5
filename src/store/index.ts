/**
 * Store Module
 */

export { IdentifierStore, sortIdentifiers } from './identifier-store.js';
