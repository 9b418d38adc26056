import type { BackendConfig } from "../src/config.js";
import type { DriverInfo, LapDataSource, SessionInfo, TimedLap } from "../src/lapDataClient.js";

export const TEST_CONFIG: BackendConfig = {
  HOST: "127.0.0.1",
  PORT: 3001,
  LOG_LEVEL: "silent",
  REDIS_URL: "redis://127.0.0.1:6399",
  CALIBRATION_BASE_URL: "http://calibration.test",
  CALIBRATION_CACHE_TTL_SECONDS: 60,
  MAX_SIMULATIONS: 100,
  MAX_RUNS_PER_CELL: 10,
  DEFAULT_RUNS_PER_CELL: 2
};

export const SESSION: SessionInfo = {
  sessionKey: 9158,
  sessionName: "Race",
  location: "Monza",
  countryName: "Italy",
  year: 2023
};

export const DRIVERS: DriverInfo[] = [
  { driverNumber: 16, acronym: "AAA", fullName: "Driver Alpha" },
  { driverNumber: 55, acronym: "BBB", fullName: null }
];

// Lap 4 is a pit-in lap and lap 5 the matching pit-out lap.
export const LAPS: TimedLap[] = [
  { lapNumber: 1, lapTime: null, pitOut: false },
  { lapNumber: 2, lapTime: 84.0, pitOut: false },
  { lapNumber: 3, lapTime: 84.4, pitOut: false },
  { lapNumber: 4, lapTime: 106.0, pitOut: false },
  { lapNumber: 5, lapTime: 90.0, pitOut: true },
  { lapNumber: 6, lapTime: 84.2, pitOut: false },
  { lapNumber: 7, lapTime: 84.6, pitOut: false }
];

export const PIT_LAPS = [4];

export class FakeLapDataSource implements LapDataSource {
  constructor(
    private readonly drivers: DriverInfo[] = DRIVERS,
    private readonly laps: TimedLap[] = LAPS
  ) {}

  async getSession(sessionKey: number): Promise<SessionInfo> {
    return { ...SESSION, sessionKey };
  }

  async getDrivers(): Promise<DriverInfo[]> {
    return this.drivers.map((driver) => ({ ...driver }));
  }

  async getLaps(): Promise<TimedLap[]> {
    return this.laps.map((lap) => ({ ...lap }));
  }

  async getPitLaps(): Promise<number[]> {
    return [...PIT_LAPS];
  }
}
