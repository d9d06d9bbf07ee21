/**
 * A directory group with its display name.
 */
export interface NamedGroup {
  id: string;
  name: string;
}

/**
 * Client for the directory (graph) service.
 *
 * Built-in implementation: DirectoryClient (from 'directory-session-auth')
 */
export interface IDirectoryClient {
  /**
   * Resolve the group ids the bearer of `accessToken` belongs to.
   * @throws AuthError
   */
  getUserGroups(accessToken: string): Promise<Set<string>>;

  /**
   * Map every group id in the organization to its display name.
   * Used for display only, never for authorization.
   * @throws AuthError
   */
  getAllGroups(accessToken: string): Promise<Map<string, string>>;
}
