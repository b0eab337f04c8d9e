import { describe, expect, it, vi } from "vitest";
import {
  InvalidInputError,
  formatRawData,
  sanitizeCity,
  synthesizeWeather,
  temperatureBase,
} from "./weather.service.js";

describe("sanitizeCity", () => {
  it("trims surrounding whitespace", () => {
    expect(sanitizeCity("  Berlin ")).toBe("Berlin");
  });

  it("rejects empty and whitespace-only names", () => {
    expect(() => sanitizeCity("")).toThrow(InvalidInputError);
    expect(() => sanitizeCity("   ")).toThrow("City must not be empty");
  });

  it("puts no upper bound on the length", () => {
    expect(sanitizeCity("x".repeat(200))).toHaveLength(200);
  });
});

describe("temperatureBase", () => {
  it("sums lowercased code points modulo 30", () => {
    // b+e+r+l+i+n = 636
    expect(temperatureBase("Berlin")).toBe(6);
    // l+o+n+d+o+n = 650
    expect(temperatureBase("London")).toBe(20);
  });

  it("ignores case", () => {
    expect(temperatureBase("BERLIN")).toBe(temperatureBase("berlin"));
  });
});

describe("synthesizeWeather", () => {
  it("derives every field from the city and one random draw", () => {
    expect(synthesizeWeather("Berlin", () => 0.5)).toEqual({
      temperature: 6,
      humidity: 66,
      windSpeed: 11,
    });
  });

  it("maps the random draw onto a -5..+5 jitter", () => {
    expect(synthesizeWeather("Berlin", () => 0).temperature).toBe(1);
    expect(synthesizeWeather("Berlin", () => 0.25).temperature).toBe(3.5);
    expect(synthesizeWeather("Berlin", () => 0.9999).temperature).toBeCloseTo(
      10.999,
      3
    );
  });

  it("consumes exactly one random draw", () => {
    const random = vi.fn(() => 0.5);
    synthesizeWeather("Paris", random);
    expect(random).toHaveBeenCalledTimes(1);
  });

  it("uses the first character as written for humidity", () => {
    expect(synthesizeWeather("Berlin", () => 0.5).humidity).toBe(66);
    expect(synthesizeWeather("berlin", () => 0.5).humidity).toBe(58);
  });

  it("reads the name exactly as written, surrounding spaces included", () => {
    // " berlin" sums to 668; the leading space (32) drives humidity
    expect(synthesizeWeather(" Berlin", () => 0.5)).toEqual({
      temperature: 8,
      humidity: 72,
      windSpeed: 12,
    });
  });

  it("accepts any non-empty name", () => {
    expect(synthesizeWeather("   ", () => 0.5)).toEqual({
      temperature: 6,
      humidity: 72,
      windSpeed: 8,
    });
    // 81 * "x" (120) = 9720, a multiple of 30
    expect(synthesizeWeather("x".repeat(81), () => 0.5)).toEqual({
      temperature: 0,
      humidity: 40,
      windSpeed: 11,
    });
  });

  it("is repeatable for a fixed draw", () => {
    const a = synthesizeWeather("Reykjavik", () => 0.3);
    const b = synthesizeWeather("Reykjavik", () => 0.3);
    expect(a).toEqual(b);
  });

  it("keeps every field within its range", () => {
    const cities = [
      "A",
      "Oslo",
      "Zürich",
      "São Paulo",
      "Llanfairpwllgwyngyllgogerychwyrndrobwllllantysiliogogogoch",
      "東京",
      "~",
    ];
    for (const city of cities) {
      const base = temperatureBase(city);
      for (const draw of [0, 0.5, 0.9999]) {
        const reading = synthesizeWeather(city, () => draw);
        expect(reading.humidity).toBeGreaterThanOrEqual(40);
        expect(reading.humidity).toBeLessThanOrEqual(79);
        expect(reading.windSpeed).toBeGreaterThanOrEqual(5);
        expect(reading.windSpeed).toBeLessThanOrEqual(19);
        expect(reading.temperature).toBeGreaterThanOrEqual(base - 5);
        expect(reading.temperature).toBeLessThanOrEqual(base + 5);
      }
    }
  });

  it("throws InvalidInputError only for the empty string", () => {
    const random = vi.fn(() => 0.5);
    expect(() => synthesizeWeather("", random)).toThrow(
      new InvalidInputError("City must not be empty")
    );
    expect(random).not.toHaveBeenCalled();
  });
});

describe("formatRawData", () => {
  it("echoes the reading with one decimal for temperature and wind", () => {
    expect(formatRawData({ temperature: 6, humidity: 66, windSpeed: 11 })).toBe(
      "Raw Data: 6.0°C, 66% humidity, 11.0 km/h wind"
    );
    expect(
      formatRawData({ temperature: -3.14, humidity: 40, windSpeed: 5.25 })
    ).toBe("Raw Data: -3.1°C, 40% humidity, 5.3 km/h wind");
  });
});
