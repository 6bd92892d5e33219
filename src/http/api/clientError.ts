/**
 * An error whose message is safe to return to the client, together with the
 * HTTP status to return it with.
 */
export default class ClientError extends Error {
  status: number;
  constructor(message: string, status: number) {
    super(message);
    this.status = status;
  }
}
