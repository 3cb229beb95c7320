/**
 * Time helper functions
 */

function pad2(n: number): string {
  return n < 10 ? '0' + n : String(n);
}

/**
 * Format a timestamp as local `YYYY-MM-DD HH:MM:SS`
 * @param ms - Milliseconds since epoch
 */
export function formatTimestamp(ms: number): string {
  const d = new Date(ms);
  return d.getFullYear() + '-' + pad2(d.getMonth() + 1) + '-' + pad2(d.getDate()) +
    ' ' + pad2(d.getHours()) + ':' + pad2(d.getMinutes()) + ':' + pad2(d.getSeconds());
}
