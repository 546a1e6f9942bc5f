import type { JsonPart, Part, TextPart } from './index.js';

export function isTextPart(part: Part): part is TextPart {
  return part.type === 'text';
}

export function isJsonPart(part: Part): part is JsonPart {
  return part.type === 'json';
}
