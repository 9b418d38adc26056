import { FUEL_BURN_RATE_KG, FUEL_SECONDS_PER_KG } from "../constants";

export function remainingFuel(lap: number, startingFuelKg: number, burnRate = FUEL_BURN_RATE_KG): number {
  return Math.max(0, startingFuelKg - lap * burnRate);
}

export function fuelPenalty(lap: number, startingFuelKg: number, burnRate = FUEL_BURN_RATE_KG): number {
  return remainingFuel(lap, startingFuelKg, burnRate) * FUEL_SECONDS_PER_KG;
}
