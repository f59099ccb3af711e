/**
 * A request to the compilation service that did not produce a usable
 * response.
 */
export class ExplorerRequestError extends Error {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = "ExplorerRequestError";
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, ExplorerRequestError.prototype);
  }
}
