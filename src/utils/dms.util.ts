// Degree-minute-second codec for directional tokens such as N433604 / E0713936

import { Axis, Hemisphere } from '../types/domain.types';

const LATITUDE_WIDTH = 6;   // DDMMSS
const LONGITUDE_WIDTH = 7;  // DDDMMSS

// Guards truncation against binary noise (43.60111... * 3600 = 156963.99999999997)
const ARC_SECOND_EPSILON = 1e-6;

function isHemisphere(value: string): value is Hemisphere {
  return value === 'N' || value === 'S' || value === 'E' || value === 'W';
}

function axisOf(hemisphere: Hemisphere): Axis {
  return hemisphere === 'N' || hemisphere === 'S' ? 'latitude' : 'longitude';
}

/**
 * Converts a directional DMS token to signed decimal degrees.
 *
 * The first character is the hemisphere letter, the rest the digit string.
 * Short digit strings are left-padded with zeros (N4336 reads as N004336),
 * so any token decodes without throwing.
 */
export function decodeDms(token: string): number {
  const trimmed = token.trim();
  const direction = trimmed.charAt(0).toUpperCase();
  const digits = trimmed.slice(1).replace(/\D/g, '');

  let axis: Axis;
  let sign = 1;
  if (isHemisphere(direction)) {
    axis = axisOf(direction);
    sign = direction === 'S' || direction === 'W' ? -1 : 1;
  } else {
    axis = digits.length === LONGITUDE_WIDTH ? 'longitude' : 'latitude';
  }

  const width = axis === 'latitude' ? LATITUDE_WIDTH : LONGITUDE_WIDTH;
  const degreeDigits = width - 4;
  const padded = digits.padStart(width, '0');

  const degrees = Number(padded.slice(0, degreeDigits));
  const minutes = Number(padded.slice(degreeDigits, degreeDigits + 2));
  const seconds = Number(padded.slice(degreeDigits + 2, degreeDigits + 4));

  return sign * (degrees + minutes / 60 + seconds / 3600);
}

/**
 * Converts signed decimal degrees to a fixed-width DMS token.
 * Seconds are truncated, not rounded.
 */
export function encodeDms(value: number, axis: Axis): string {
  const totalSeconds = Math.floor(Math.abs(value) * 3600 + ARC_SECOND_EPSILON);
  const degrees = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  const direction = axis === 'latitude'
    ? (value >= 0 ? 'N' : 'S')
    : (value >= 0 ? 'E' : 'W');
  const degreeWidth = axis === 'latitude' ? 2 : 3;

  return `${direction}${pad(degrees, degreeWidth)}${pad(minutes, 2)}${pad(seconds, 2)}`;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/** Renders a coordinate as its latitude and longitude DMS tokens */
export function toDmsPair(latitude: number, longitude: number): { latitude: string; longitude: string } {
  return {
    latitude: encodeDms(latitude, 'latitude'),
    longitude: encodeDms(longitude, 'longitude')
  };
}
