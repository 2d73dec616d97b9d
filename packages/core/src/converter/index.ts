/**
 * Converter Module
 *
 * @module converter
 */

export { type ByteSink, type Converter, isConverter } from './types.js';
export { StringConverter, BufferConverter, JsonConverter } from './converters.js';
