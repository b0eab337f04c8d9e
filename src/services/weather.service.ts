/**
 * Weather service: synthetic readings derived from the city name.
 * Nothing here touches the network; the only non-determinism is the
 * temperature jitter, drawn from an injectable random source.
 */

export type WeatherReading = Readonly<{
  temperature: number;
  humidity: number;
  windSpeed: number;
}>;

/**
 * Returns a value in [0, 1), like Math.random.
 */
export type RandomSource = () => number;

export const JITTER_RANGE_C = 5;

export class InvalidInputError extends Error {
  constructor(message: string, public readonly input?: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

/**
 * Normalizes a city taken from a request (HTTP body, MCP arguments).
 * The synthesizer itself reads the name exactly as given.
 */
export function sanitizeCity(rawCity: string): string {
  const trimmed = rawCity.trim();
  if (trimmed.length === 0) {
    throw new InvalidInputError("City must not be empty", rawCity);
  }
  return trimmed;
}

function codePoints(text: string): number[] {
  return Array.from(text, (ch) => ch.codePointAt(0) ?? 0);
}

/**
 * Deterministic part of the temperature, in [0, 29].
 */
export function temperatureBase(city: string): number {
  const sum = codePoints(city.toLowerCase()).reduce((acc, cp) => acc + cp, 0);
  return sum % 30;
}

export function synthesizeWeather(
  city: string,
  random: RandomSource = Math.random
): WeatherReading {
  if (city.length === 0) {
    throw new InvalidInputError("City must not be empty", city);
  }
  const jitter = -JITTER_RANGE_C + 2 * JITTER_RANGE_C * random();
  const first = city.codePointAt(0) ?? 0;

  return {
    temperature: temperatureBase(city) + jitter,
    humidity: 40 + (first % 40),
    windSpeed: 5 + (codePoints(city).length % 15),
  };
}

/**
 * One-line echo of a reading, shared by every report footer.
 */
export function formatRawData(reading: WeatherReading): string {
  return (
    `Raw Data: ${reading.temperature.toFixed(1)}°C, ` +
    `${reading.humidity}% humidity, ${reading.windSpeed.toFixed(1)} km/h wind`
  );
}
