export const EARTH_RADIUS_M = 6_371_000

const toRad = (deg: number) => (deg * Math.PI) / 180

/**
 * Great-circle distance in meters between two points given in decimal degrees
 * (haversine on a sphere of radius {@link EARTH_RADIUS_M}).
 */
export const haversineDistance = (
  lon1: number,
  lat1: number,
  lon2: number,
  lat2: number,
): number => {
  const phi1 = toRad(lat1)
  const phi2 = toRad(lat2)
  const dPhi = phi2 - phi1
  const dLambda = toRad(lon2) - toRad(lon1)

  const a =
    Math.sin(dPhi / 2) ** 2 + Math.cos(phi1) * Math.cos(phi2) * Math.sin(dLambda / 2) ** 2

  // rounding can push a just above 1 for near-antipodal points
  return 2 * Math.asin(Math.sqrt(Math.min(1, a))) * EARTH_RADIUS_M
}
