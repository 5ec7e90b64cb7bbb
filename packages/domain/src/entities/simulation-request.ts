/**
 * Location and start time to synthesize a GPS signal for.
 * Coordinates are WGS-84 degrees, altitude is metres above the ellipsoid.
 * No range validation is applied; callers only check the values are finite.
 */
export interface SimulationRequest {
  readonly latitude: number;
  readonly longitude: number;
  readonly altitude: number;
  /** Second precision; calendar fields are read in UTC. */
  readonly startTime: Date;
}
