/**
 * Raised when a wire filter does not follow the filter grammar.
 * `jsonPath` points at the offending node, e.g. `$.AND[1].IN`.
 */
export class FilterCodecError extends Error {
  public readonly jsonPath: string;

  constructor(message: string, jsonPath: string) {
    super(`${message} (at ${jsonPath})`);
    this.name = 'FilterCodecError';
    this.jsonPath = jsonPath;
  }
}

/**
 * Raised by encode for filter values it cannot express on the wire:
 * anchored filters and exclusion options.
 */
export class UnsupportedFilterError extends Error {
  public readonly key: string;
  public readonly filterType: string;

  constructor(message: string, key: string, filterType: string) {
    super(message);
    this.name = 'UnsupportedFilterError';
    this.key = key;
    this.filterType = filterType;
  }
}
