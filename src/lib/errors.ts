/**
 * Error types raised by the dial core.
 */

import type { DialConfiguration } from "../types/dial";

/** Name of a configuration field that failed validation. */
export type ConfigurationField = keyof DialConfiguration;

/**
 * Raised when a dial is constructed from a malformed range,
 * step, subdivision count or angular span.
 */
export class InvalidConfigurationError extends Error {
  readonly field: ConfigurationField;

  constructor(field: ConfigurationField, message: string) {
    super(message);
    this.name = "InvalidConfigurationError";
    this.field = field;
  }
}
