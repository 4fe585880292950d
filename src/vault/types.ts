/** Named credential fields read from one logical secret path. */
export type SecretBundle = Readonly<Record<string, string>>;

export interface SecretProvider {
  name: string;
  /** Throws SecretFetchError when the path is missing or holds no fields. */
  getSecretBundle(path: string): Promise<SecretBundle>;
  setSecretField(path: string, field: string, value: string): Promise<void>;
  deleteSecret(path: string): Promise<void>;
  listSecrets(): Promise<Array<{ path: string; fields: string[]; lastModified?: string }>>;
  status(): Promise<{ healthy: boolean; provider: string; message?: string }>;
}
