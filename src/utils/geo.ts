export const MEAN_EARTH_RADIUS_KM = 6371.0088

export type LatLon = {
  lat: number
  lon: number
}

const toRad = (deg: number) => (deg * Math.PI) / 180

/**
 * Great-circle distance in metres (haversine, spherical Earth).
 */
export const haversineDistanceM = (
  a: LatLon,
  b: LatLon,
  earthRadiusKm: number = MEAN_EARTH_RADIUS_KM,
): number => {
  const dLat = toRad(b.lat - a.lat)
  const dLon = toRad(b.lon - a.lon)
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(a.lat)) * Math.cos(toRad(b.lat)) * Math.sin(dLon / 2) ** 2

  return earthRadiusKm * 1000 * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h))
}

/**
 * Linear interpolation between two coordinates, fraction in [0, 1].
 * Good enough for the sub-kilometre spacing of GPS samples.
 */
export const interpolateLatLon = (a: LatLon, b: LatLon, fraction: number): LatLon => ({
  lat: a.lat + (b.lat - a.lat) * fraction,
  lon: a.lon + (b.lon - a.lon) * fraction,
})

/**
 * Shortest distance in metres from `p` to the segment `a`-`b`, using an
 * equirectangular projection centred on `p`.
 */
export const distanceToSegmentM = (
  p: LatLon,
  a: LatLon,
  b: LatLon,
  earthRadiusKm: number = MEAN_EARTH_RADIUS_KM,
): number => {
  const metresPerRad = earthRadiusKm * 1000
  const cosLat = Math.cos(toRad(p.lat))
  const project = (q: LatLon) => ({
    x: toRad(q.lon - p.lon) * cosLat * metresPerRad,
    y: toRad(q.lat - p.lat) * metresPerRad,
  })

  const pa = project(a)
  const pb = project(b)
  const dx = pb.x - pa.x
  const dy = pb.y - pa.y
  const lengthSq = dx * dx + dy * dy

  const t = lengthSq === 0 ? 0 : Math.max(0, Math.min(1, -(pa.x * dx + pa.y * dy) / lengthSq))
  const cx = pa.x + t * dx
  const cy = pa.y + t * dy

  return Math.sqrt(cx * cx + cy * cy)
}

export const roundTo = (value: number, decimals: number): number => {
  const factor = 10 ** decimals
  return Math.round(value * factor) / factor
}
