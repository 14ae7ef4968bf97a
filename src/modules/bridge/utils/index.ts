/**
 * Bridge Utilities
 */

export { isJsonObject, setOwnValue, toJsonValue, parseJson, type JsonParseResult } from './json';
