/**
 * The API version served under `/v2` by both daemons.
 */
const API_VERSION = 2;

/**
 * The default node daemon (factomd) port.
 */
const FACTOMD_PORT = 8089;

/**
 * The default wallet daemon (factom-walletd) port.
 */
const WALLETD_PORT = 8088;

const DEFAULT_HOST = "localhost";

/**
 * Builds a daemon endpoint.
 * @param host The host name.
 * @param port The daemon port.
 * @param https Use `https` instead of `http`.
 * @example
 * buildEndpoint("node.example.com", 8089, true); // 'https://node.example.com:8089/v2'
 */
const buildEndpoint = (host: string, port: number, https = false): string => {
  const scheme = https ? "https" : "http";
  return `${scheme}://${host}:${port}/v${API_VERSION}`;
};

const DEFAULT_FACTOMD_ENDPOINT = buildEndpoint(DEFAULT_HOST, FACTOMD_PORT);
const DEFAULT_WALLETD_ENDPOINT = buildEndpoint(DEFAULT_HOST, WALLETD_PORT);

export {
  API_VERSION,
  FACTOMD_PORT,
  WALLETD_PORT,
  DEFAULT_FACTOMD_ENDPOINT,
  DEFAULT_WALLETD_ENDPOINT,
  buildEndpoint,
};
