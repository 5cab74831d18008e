/**
 * The broker redirects back to the dashboard with `?request_token=…&status=success`.
 */

export function readRequestToken(search: string): string | null {
  const params = new URLSearchParams(search);
  const token = params.get('request_token')?.trim();
  if (!token) return null;
  const status = params.get('status');
  if (status && status !== 'success') return null;
  return token;
}

/** Query string without the login callback params, `''` or `?…`. */
export function stripLoginParams(search: string): string {
  const params = new URLSearchParams(search);
  params.delete('request_token');
  params.delete('status');
  params.delete('action');
  params.delete('type');
  const rest = params.toString();
  return rest ? `?${rest}` : '';
}
