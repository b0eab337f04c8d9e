import { describe, expect, it } from "vitest";
import { classifyComfort, composeRuleReport } from "./rule-engine.service.js";
import type { WeatherReading } from "./weather.service.js";

function reading(overrides: Partial<WeatherReading> = {}): WeatherReading {
  return { temperature: 15, humidity: 50, windSpeed: 10, ...overrides };
}

describe("classifyComfort", () => {
  it.each<[number, string, number]>([
    [-20, "freezing", 2],
    [-0.1, "freezing", 2],
    [0, "cold", 4],
    [9.9, "cold", 4],
    [10, "pleasant", 8],
    [24.9, "pleasant", 8],
    [25, "hot", 6],
    [34.9, "hot", 6],
    [35, "extremely hot", 3],
    [48, "extremely hot", 3],
  ])("classifies %s°C as %s with comfort %s", (temperature, description, comfort) => {
    const c = classifyComfort(reading({ temperature }));
    expect(c.description).toBe(description);
    expect(c.comfort).toBe(comfort);
  });

  it("returns the bucket's advice unchanged in mild conditions", () => {
    expect(classifyComfort(reading({ temperature: -5 }))).toEqual({
      description: "freezing",
      comfort: 2,
      activities: "indoor activities, ice skating",
      clothing: "heavy winter coat, gloves, warm boots",
      warning: "⚠️ Risk of frostbite - limit outdoor exposure",
    });
  });

  it("lowers comfort and warns when humidity is above 80", () => {
    const c = classifyComfort(reading({ temperature: 15, humidity: 85 }));
    expect(c.comfort).toBe(7);
    expect(c.warning).toBe(
      "Perfect weather for outdoor activities! High humidity will make it feel warmer."
    );
  });

  it("leaves humidity of exactly 80 alone", () => {
    const c = classifyComfort(reading({ humidity: 80 }));
    expect(c.comfort).toBe(8);
    expect(c.warning).toBe("Perfect weather for outdoor activities!");
  });

  it("warns about dry skin below 30% humidity without changing comfort", () => {
    const c = classifyComfort(reading({ temperature: 30, humidity: 20 }));
    expect(c.comfort).toBe(6);
    expect(c.warning).toBe(
      "Stay hydrated and seek shade Low humidity may cause dry skin."
    );
  });

  it("adds the wind note above 20 km/h in any bucket", () => {
    for (const temperature of [-3, 5, 15, 30, 40]) {
      const c = classifyComfort(reading({ temperature, windSpeed: 25 }));
      expect(c.warning.endsWith(" Strong winds - secure loose items.")).toBe(true);
    }
    expect(classifyComfort(reading({ windSpeed: 20 })).warning).toBe(
      "Perfect weather for outdoor activities!"
    );
  });

  it("applies humidity and wind notes together", () => {
    const c = classifyComfort(
      reading({ temperature: 38, humidity: 90, windSpeed: 30 })
    );
    expect(c.comfort).toBe(2);
    expect(c.warning).toBe(
      "⚠️ Heat warning - avoid prolonged sun exposure High humidity will make it feel warmer. Strong winds - secure loose items."
    );
  });

  it("keeps the lowest comfort on the 1-10 scale", () => {
    expect(classifyComfort(reading({ temperature: -10, humidity: 95 })).comfort).toBe(1);
  });
});

describe("composeRuleReport", () => {
  it("lays out the full fallback report", () => {
    const report = composeRuleReport(
      { temperature: 6, humidity: 66, windSpeed: 11 },
      "Berlin"
    );
    expect(report).toBe(
      [
        "🤖 Weather Analysis for Berlin:",
        "",
        "Assessment: Cold weather with 66% humidity",
        "Comfort Level: 4/10",
        "Wind Conditions: 11.0 km/h",
        "",
        "Recommended Activities: brisk walks, winter sports",
        "What to Wear: warm jacket, layers, closed shoes",
        "Weather Tips: Bundle up to stay warm",
        "",
        "---",
        "Raw Data: 6.0°C, 66% humidity, 11.0 km/h wind",
        "Analysis: Rule-based (LLM unavailable)",
      ].join("\n")
    );
  });

  it("title-cases multi-word descriptions", () => {
    const report = composeRuleReport(reading({ temperature: 36.2 }), "Cairo");
    expect(report.split("\n")[2]).toBe(
      "Assessment: Extremely Hot weather with 50% humidity"
    );
  });
});
