/**
 * Input validation for chat command arguments
 */

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  error?: string;
}

const MAX_QUERY_LENGTH = 1000;
const MAX_DIRECTION_LENGTH = 200;
const MAX_STATION_NAME_LENGTH = 32;

/**
 * Validates search queries for music playback
 */
export function validateSearchQuery(query: string): ValidationResult<string> {
  const trimmed = (query ?? '').trim();
  if (trimmed.length === 0) {
    return { success: false, error: 'Search query cannot be empty' };
  }

  if (trimmed.length > MAX_QUERY_LENGTH) {
    return { success: false, error: `Search query is too long (max ${MAX_QUERY_LENGTH} characters)` };
  }

  const maliciousPatterns = [
    /<script[\s\S]*?>[\s\S]*?<\/script>/i,
    /javascript:/i,
    /data:text\/html/i,
    /vbscript:/i,
  ];

  for (const pattern of maliciousPatterns) {
    if (pattern.test(trimmed)) {
      return { success: false, error: 'Query contains malicious content' };
    }
  }

  // strip HTML-ish characters, keep URLs and music metadata intact
  return { success: true, data: trimmed.replace(/[<>"]/g, '') };
}

/**
 * Radio descriptions, tune directions and artist names
 */
export function validateFreeText(text: string, label: string): ValidationResult<string> {
  const trimmed = (text ?? '').replace(/\s+/g, ' ').trim();
  if (trimmed.length === 0) {
    return { success: false, error: `${label} cannot be empty` };
  }
  if (trimmed.length > MAX_DIRECTION_LENGTH) {
    return { success: false, error: `${label} is too long (max ${MAX_DIRECTION_LENGTH} characters)` };
  }
  return { success: true, data: trimmed };
}

export function validateStationName(name: string): ValidationResult<string> {
  const trimmed = (name ?? '').trim().toLowerCase();
  if (trimmed.length === 0) {
    return { success: false, error: 'Station name cannot be empty' };
  }
  if (trimmed.length > MAX_STATION_NAME_LENGTH) {
    return { success: false, error: `Station name is too long (max ${MAX_STATION_NAME_LENGTH} characters)` };
  }
  if (!/^[\p{L}\p{N} _-]+$/u.test(trimmed)) {
    return { success: false, error: 'Station names may only use letters, numbers, spaces, - and _' };
  }
  return { success: true, data: trimmed };
}
