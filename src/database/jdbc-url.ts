import type { DatabaseConfig } from '../config/database.config';

const JDBC_PREFIX = 'jdbc:';
const POSTGRES_PROTOCOL = 'postgresql:';

/**
 * Connection settings named by a PostgreSQL JDBC url
 * e.g. jdbc:postgresql://localhost:5432/test?user=test&password=test-secret
 * Only the parts present in the url are returned; the rest fall back to the database config
 */
export function parseJdbcUrl(jdbcUrl: string): Partial<DatabaseConfig> {
  if (!jdbcUrl.startsWith(JDBC_PREFIX)) {
    throw new Error(`Invalid JDBC url '${jdbcUrl}': must start with ${JDBC_PREFIX}`);
  }

  let url: URL;
  try {
    url = new URL(jdbcUrl.slice(JDBC_PREFIX.length));
  } catch (error) {
    throw new Error(`Invalid JDBC url '${jdbcUrl}'`, { cause: error });
  }
  if (url.protocol !== POSTGRES_PROTOCOL) {
    throw new Error(`Unsupported JDBC url '${jdbcUrl}': only postgresql stores can be read back`);
  }

  const target: Partial<DatabaseConfig> = {};
  if (url.hostname) target.host = url.hostname;
  if (url.port) target.port = parseInt(url.port, 10);

  const database = decodeURIComponent(url.pathname.replace(/^\//, ''));
  if (database) target.database = database;

  const user = url.searchParams.get('user') ?? (url.username ? decodeURIComponent(url.username) : null);
  if (user) target.user = user;
  const password = url.searchParams.get('password') ?? (url.password ? decodeURIComponent(url.password) : null);
  if (password) target.password = password;

  return target;
}
