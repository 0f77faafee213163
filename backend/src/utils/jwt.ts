/** Safe token reference for logs: the first 10 characters only. */
export function formatTokenForLogging(token: string | undefined): string {
  if (!token) {
    return '<empty token>';
  }
  if (token.split('.').length !== 3) {
    return '<invalid token format>';
  }
  return `${token.slice(0, 10)}...`;
}
