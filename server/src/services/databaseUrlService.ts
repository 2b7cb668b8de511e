import { fileURLToPath } from 'node:url';
import { SecretManagerServiceClient } from '@google-cloud/secret-manager';
import { StoreError } from '../errors/AppError.js';
import type { AppConfig } from '../plugins/config.js';

// A URL scheme of two or more characters; a single letter is a Windows drive
const URL_SCHEME = /^([a-z][a-z0-9+.-]+):/i;

export type DatabaseUrlSource = 'env' | 'secret-manager';

export interface ResolvedDatabaseUrl {
  url: string;
  source: DatabaseUrlSource;
}

/**
 * Resolves where the database lives. Consumed once at startup.
 */
export interface DatabaseUrlResolver {
  readonly source: DatabaseUrlSource;
  resolve(): Promise<ResolvedDatabaseUrl>;
}

/**
 * The slice of a secret store the resolver needs.
 */
export interface SecretAccessor {
  getProjectId(): Promise<string>;
  /** Returns the payload of a fully qualified secret version name. */
  accessSecretVersion(name: string): Promise<string>;
}

export class EnvDatabaseUrlResolver implements DatabaseUrlResolver {
  readonly source = 'env';

  constructor(private readonly url: string) {}

  async resolve(): Promise<ResolvedDatabaseUrl> {
    return { url: this.url, source: this.source };
  }
}

export class SecretManagerDatabaseUrlResolver implements DatabaseUrlResolver {
  readonly source = 'secret-manager';

  constructor(
    private readonly secretName: string,
    private readonly accessor: SecretAccessor,
    private readonly projectId?: string,
  ) {}

  async resolve(): Promise<ResolvedDatabaseUrl> {
    const projectId = this.projectId ?? (await this.accessor.getProjectId());
    if (!projectId) {
      throw new Error('Could not determine the Google Cloud project owning the database secret');
    }

    const name = `projects/${projectId}/secrets/${this.secretName}/versions/latest`;
    const url = (await this.accessor.accessSecretVersion(name)).trim();
    if (url.length === 0) {
      throw new Error(`Secret ${this.secretName} is empty`);
    }

    return { url, source: this.source };
  }
}

/**
 * Turn a resolved database location into a path better-sqlite3 can open.
 * Plain paths, `:memory:` and `file:` URLs are accepted; any other scheme
 * (e.g. a `postgresql://` connection string) is rejected. The location itself
 * is left out of the error since it may carry credentials.
 */
export function toSqlitePath(location: string): string {
  const match = URL_SCHEME.exec(location);
  if (!match) {
    return location;
  }
  const scheme = match[1].toLowerCase();
  if (scheme !== 'file') {
    throw new StoreError(
      `Unsupported database location scheme '${scheme}:'; expected a SQLite file path`,
    );
  }
  return fileURLToPath(location);
}

/**
 * Adapt the Google Cloud Secret Manager client to {@link SecretAccessor}.
 */
export function createGoogleSecretAccessor(projectId?: string): SecretAccessor {
  const client = new SecretManagerServiceClient(projectId ? { projectId } : {});

  return {
    getProjectId: () => client.getProjectId(),
    async accessSecretVersion(name) {
      const [version] = await client.accessSecretVersion({ name });
      const data = version.payload?.data;
      if (data === null || data === undefined) {
        throw new Error(`Secret version ${name} has no payload`);
      }
      return typeof data === 'string' ? data : Buffer.from(data).toString('utf-8');
    },
  };
}

/**
 * Pick the resolver for this deployment: a locally configured DATABASE_URL
 * wins, otherwise the location is read from Secret Manager.
 */
export function createDatabaseUrlResolver(
  config: Pick<AppConfig, 'databaseUrl' | 'databaseSecretName' | 'gcpProjectId'>,
  accessorFactory: (projectId?: string) => SecretAccessor = createGoogleSecretAccessor,
): DatabaseUrlResolver {
  if (config.databaseUrl) {
    return new EnvDatabaseUrlResolver(config.databaseUrl);
  }
  return new SecretManagerDatabaseUrlResolver(
    config.databaseSecretName,
    accessorFactory(config.gcpProjectId),
    config.gcpProjectId,
  );
}
