import { SecureValue } from './secure-value';

/**
 * A user name paired with a secret.
 *
 * The comparator only ever looks at `userName`; the secret is written back by
 * the serializer but never compared.
 */
export class Credential {
  readonly userName: string;
  readonly secret: SecureValue;

  constructor(userName: string, secret: SecureValue | string) {
    this.userName = userName;
    this.secret = typeof secret === 'string' ? new SecureValue(secret) : secret;
  }
}
