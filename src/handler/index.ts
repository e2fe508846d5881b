/**
 * Handler base class.
 *
 * @module handler
 */

export { RequestHandler } from './base.js';
