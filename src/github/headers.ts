/**
 * Request headers for the GitHub REST API v3
 */

export const GITHUB_ACCEPT_HEADER = 'application/vnd.github.v3+json';

// A type alias (not an interface) so it stays assignable to Octokit's header map
export type GitHubRequestHeaders = {
  Authorization: string;
  Accept: string;
};

export function buildRequestHeaders(token: string): GitHubRequestHeaders {
  return {
    Authorization: `token ${token}`,
    Accept: GITHUB_ACCEPT_HEADER,
  };
}

/**
 * Exact comparison: same keys, same values.
 */
export function headersMatch(actual: Record<string, string>, expected: Record<string, string>): boolean {
  const actualKeys = Object.keys(actual).sort();
  const expectedKeys = Object.keys(expected).sort();

  if (actualKeys.length !== expectedKeys.length) {
    return false;
  }

  return actualKeys.every((key, index) => key === expectedKeys[index] && actual[key] === expected[key]);
}
