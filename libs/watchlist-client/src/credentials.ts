import { err, ok, type Result } from 'neverthrow';
import { CredentialError, type Credentials } from './types';

/**
 * Check that both credentials are present, then that both are strings.
 * `null` and `undefined` count as absent.
 */
export function validateCredentials(
  username: unknown,
  password: unknown,
): Result<Credentials, CredentialError> {
  const missingUsername = username === undefined || username === null;
  const missingPassword = password === undefined || password === null;

  if (missingUsername && missingPassword) {
    return err(new CredentialError('Missing username and password', 'missing'));
  }
  if (missingUsername) {
    return err(new CredentialError('Missing username', 'missing'));
  }
  if (missingPassword) {
    return err(new CredentialError('Missing password', 'missing'));
  }

  if (typeof username !== 'string' || typeof password !== 'string') {
    return err(new CredentialError('Invalid credentials type', 'invalid-type'));
  }
  return ok({ username, password });
}
