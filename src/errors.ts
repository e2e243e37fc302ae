/**
 * @file errors.ts
 * @description Error classes for the two failures that can stop the game
 *              before the loop starts.  The simulation itself never throws.
 */

export type ConfigErrorCode = 'INVALID_CONFIG' | 'INVALID_ENV';

/** Configuration failed validation (e.g. a non-positive arena size). */
export class ConfigError extends Error
{
  constructor(public readonly code: ConfigErrorCode, message: string)
  {
    super(message);
    this.name = 'ConfigError';
  }
}

export type SurfaceErrorCode = 'NO_TTY';

/** The terminal cannot host the game (not interactive). */
export class SurfaceError extends Error
{
  constructor(public readonly code: SurfaceErrorCode, message: string)
  {
    super(message);
    this.name = 'SurfaceError';
  }
}
