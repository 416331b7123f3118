/**
 * Thrown by a resource loader when the resource can never be provided in this
 * process, e.g. the answer client has no API key. The cache stops retrying.
 */
export class ResourceUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResourceUnavailableError";
  }
}
