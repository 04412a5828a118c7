import type { WorldInputs, WorldReport } from './types';
import {
  getBlackBodyTemp,
  getGravity,
  getMNumber,
  getRadiusKm,
  getSatelliteOrbitalPeriod,
  getStarOrbitalPeriod,
  getTidalAdjustment,
  getTidalNumber,
  getWorldMass
} from './physics';

/**
 * THE WORLD CALCULATOR
 *
 * Inputs in, report out. Assumes the inputs were validated at the boundary:
 * every mass, density and distance is strictly positive, so no denominator
 * here can be zero.
 */
export function computeWorld(inputs: WorldInputs): WorldReport {
  const mass = getWorldMass(inputs);
  const radiusKm = getRadiusKm(mass, inputs.density);

  // Whatever circles the star is the planet - for satellites, their primary
  const starOrbitalPeriodHours = getStarOrbitalPeriod(
    inputs.starDistance,
    inputs.starMass,
    inputs.mass
  );

  const satelliteOrbitalPeriodHours =
    inputs.type === 'lone'
      ? undefined
      : getSatelliteOrbitalPeriod(inputs.satelliteDistance, inputs.mass, inputs.satelliteMass);

  const orbitalPeriodHours =
    inputs.type === 'satellite' && satelliteOrbitalPeriodHours !== undefined
      ? satelliteOrbitalPeriodHours
      : starOrbitalPeriodHours;

  const blackBodyTempK = getBlackBodyTemp(inputs.luminosity, inputs.starDistance);
  // The derived numbers work from the radius as reported, in whole km
  const tidalNumber = getTidalNumber(inputs, Math.round(radiusKm));

  // The other body of the planet-satellite pair
  const companion = {
    mass: inputs.type === 'satellite' ? inputs.mass : inputs.satelliteMass,
    distance: inputs.satelliteDistance
  };

  return {
    type: inputs.type,
    mass,
    density: inputs.density,
    radiusKm,
    gravity: getGravity(mass, inputs.density),

    starMass: inputs.starMass,
    starDistance: inputs.starDistance,
    luminosity: inputs.luminosity,
    age: inputs.age,
    eccentricity: inputs.eccentricity,

    satellite: inputs.type === 'orbited' ? companion : undefined,
    primary: inputs.type === 'satellite' ? companion : undefined,

    orbitalPeriodHours,
    starOrbitalPeriodHours,
    satelliteOrbitalPeriodHours,

    blackBodyTempK,
    mNumber: getMNumber(blackBodyTempK, inputs.density, Math.round(radiusKm)),
    tidalNumber,
    tidalAdjustment: getTidalAdjustment(tidalNumber)
  };
}
