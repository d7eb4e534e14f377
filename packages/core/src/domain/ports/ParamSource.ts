/**
 * Port for the host's flat request parameters.
 *
 * Implement this interface to plug the engine into a web framework. Values are
 * returned in the order they were received; a repeated parameter yields several.
 */
export interface ParamSource {
  /** Every raw value received under `name`. Empty when the parameter is absent. */
  values(name: string): readonly string[];
  /** Raw request body, read by structured extractors. */
  body?(): string | undefined;
}
