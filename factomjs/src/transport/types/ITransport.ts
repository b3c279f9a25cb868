/**
 * The transport interface.
 */
abstract class ITransport {
  /**
   * The endpoint the transport sends requests to.
   */
  abstract readonly endpoint: string;

  /**
   * Sends an encoded request and resolves with the raw response body.
   * @param body - The encoded request envelope.
   * @returns The response body.
   * @throws {TransportError} If the exchange fails before a body is read.
   */
  abstract request(body: string): Promise<string>;
}

export { ITransport };
