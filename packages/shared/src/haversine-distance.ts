import type { LonLat } from "./types"

const EARTH_RADIUS_METERS = 6371008.8

/**
 * Calculate the haversine distance between two LonLat points.
 * @returns The haversine distance in meters
 */
export function haversineDistance(p1: LonLat, p2: LonLat): number {
	const dLat = (p2[1] - p1[1]) * (Math.PI / 180)
	const dLon = (p2[0] - p1[0]) * (Math.PI / 180)
	const lat1 = p1[1] * (Math.PI / 180)
	const lat2 = p2[1] * (Math.PI / 180)
	const a =
		Math.sin(dLat / 2) ** 2 +
		Math.sin(dLon / 2) ** 2 * Math.cos(lat1) * Math.cos(lat2)
	const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a))
	return EARTH_RADIUS_METERS * c
}
