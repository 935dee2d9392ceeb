/**
 * Raised when the catalog file cannot be read or does not have the expected shape.
 * Fatal for the load or build that raised it; an index built earlier stays usable.
 */
export class CatalogError extends Error {
  public readonly catalogPath: string;

  constructor(message: string, catalogPath: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'CatalogError';
    this.catalogPath = catalogPath;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CatalogError);
    }
  }
}
