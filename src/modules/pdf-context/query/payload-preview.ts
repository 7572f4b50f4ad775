import type { RequestPayload } from '../pdf-context.types';

const DATA_URL_PREFIX_CHARS = 50;
export const TRUNCATED_MARKER = '...[BASE64 TRUNCATED]';

const truncateDataUrl = (url: string) =>
  url.startsWith('data:') ? `${url.slice(0, DATA_URL_PREFIX_CHARS)}${TRUNCATED_MARKER}` : url;

/** JSON rendering of a payload for debug output, with inline image data cut short. */
export function previewPayload(payload: RequestPayload): string {
  return JSON.stringify(
    payload,
    (key, value: unknown) => (key === 'url' && typeof value === 'string' ? truncateDataUrl(value) : value),
    2
  );
}
