/**
 * The authenticated caller for the duration of one operation.
 *
 * Rebuilt per request by the authentication layer and passed explicitly into
 * every service call. `roles` keeps the stored order of the caller's roles.
 */
export interface Actor {
  login: string;
  roles: string[];
}
