import type { MeterReading } from "./types.ts";

/**
 * Holds the readings of a single building.
 */
export class Building {
  readonly name: string;
  #readings: MeterReading[] = [];

  constructor(name: string) {
    this.name = name;
  }

  addReading(timestamp: Date, kwh: number): MeterReading {
    const reading: MeterReading = { building: this.name, timestamp, kwh };
    this.#readings.push(reading);
    return reading;
  }

  get readings(): readonly MeterReading[] {
    return this.#readings;
  }

  totalConsumption(): number {
    return this.#readings.reduce((acc, reading) => acc + reading.kwh, 0);
  }
}

/**
 * Registry of buildings keyed by name. Two files with the same name feed the same building.
 */
export class BuildingManager {
  #buildings = new Map<string, Building>();

  getOrCreate(name: string): Building {
    let building = this.#buildings.get(name);
    if (!building) {
      building = new Building(name);
      this.#buildings.set(name, building);
    }
    return building;
  }

  // Sorted by name
  buildings(): Building[] {
    return [...this.#buildings.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  /**
   * Every reading of every building, ordered by timestamp then building.
   * Readings with equal keys keep their load order.
   */
  combinedReadings(): MeterReading[] {
    return this.buildings()
      .flatMap((building) => building.readings)
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime() || (a.building < b.building ? -1 : a.building > b.building ? 1 : 0));
  }
}
