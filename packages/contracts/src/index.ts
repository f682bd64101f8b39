/**
 * @einvoice-tw/contracts
 *
 * Types shared by the e-invoice SDK packages.
 * This package has zero runtime dependencies.
 *
 * @packageDocumentation
 */

// Code tables
export * from './core/codes.js';

// Requests and responses
export * from './core/invoice.js';
export * from './core/responses.js';
export * from './core/validation.js';

// Transport
export * from './transport/http.js';
