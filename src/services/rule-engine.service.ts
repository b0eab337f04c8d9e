/**
 * Rule engine: classifies a reading into comfort, activity and clothing
 * advice without any external call. Used whenever the model is unavailable.
 */
import { type WeatherReading, formatRawData } from "./weather.service.js";

export type ComfortClassification = {
  description: string;
  comfort: number;
  activities: string;
  clothing: string;
  warning: string;
};

type TemperatureBucket = Omit<ComfortClassification, "comfort"> & {
  /** Exclusive upper bound in °C. */
  below: number;
  baseComfort: number;
};

const BUCKETS: readonly TemperatureBucket[] = [
  {
    below: 0,
    description: "freezing",
    baseComfort: 2,
    activities: "indoor activities, ice skating",
    clothing: "heavy winter coat, gloves, warm boots",
    warning: "⚠️ Risk of frostbite - limit outdoor exposure",
  },
  {
    below: 10,
    description: "cold",
    baseComfort: 4,
    activities: "brisk walks, winter sports",
    clothing: "warm jacket, layers, closed shoes",
    warning: "Bundle up to stay warm",
  },
  {
    below: 25,
    description: "pleasant",
    baseComfort: 8,
    activities: "hiking, cycling, outdoor dining",
    clothing: "light jacket or sweater",
    warning: "Perfect weather for outdoor activities!",
  },
  {
    below: 35,
    description: "hot",
    baseComfort: 6,
    activities: "swimming, early morning walks",
    clothing: "light clothing, sun hat, sunscreen",
    warning: "Stay hydrated and seek shade",
  },
];

const EXTREME_HEAT: TemperatureBucket = {
  below: Number.POSITIVE_INFINITY,
  description: "extremely hot",
  baseComfort: 3,
  activities: "indoor activities, swimming",
  clothing: "minimal light clothing, sun protection",
  warning: "⚠️ Heat warning - avoid prolonged sun exposure",
};

export const HIGH_HUMIDITY = 80;
export const LOW_HUMIDITY = 30;
export const STRONG_WIND_KMH = 20;

export const MIN_COMFORT = 1;
export const MAX_COMFORT = 10;

function bucketFor(temperature: number): TemperatureBucket {
  return BUCKETS.find((b) => temperature < b.below) ?? EXTREME_HEAT;
}

export function classifyComfort(reading: WeatherReading): ComfortClassification {
  const bucket = bucketFor(reading.temperature);
  let comfort = bucket.baseComfort;
  let warning = bucket.warning;

  if (reading.humidity > HIGH_HUMIDITY) {
    comfort -= 1;
    warning += " High humidity will make it feel warmer.";
  } else if (reading.humidity < LOW_HUMIDITY) {
    warning += " Low humidity may cause dry skin.";
  }

  if (reading.windSpeed > STRONG_WIND_KMH) {
    warning += " Strong winds - secure loose items.";
  }

  return {
    description: bucket.description,
    comfort: Math.min(MAX_COMFORT, Math.max(MIN_COMFORT, comfort)),
    activities: bucket.activities,
    clothing: bucket.clothing,
    warning,
  };
}

function titleCase(text: string): string {
  return text.replace(/\b\w/g, (ch) => ch.toUpperCase());
}

export function composeRuleReport(reading: WeatherReading, city: string): string {
  const c = classifyComfort(reading);
  return [
    `🤖 Weather Analysis for ${city}:`,
    "",
    `Assessment: ${titleCase(c.description)} weather with ${reading.humidity}% humidity`,
    `Comfort Level: ${c.comfort}/10`,
    `Wind Conditions: ${reading.windSpeed.toFixed(1)} km/h`,
    "",
    `Recommended Activities: ${c.activities}`,
    `What to Wear: ${c.clothing}`,
    `Weather Tips: ${c.warning}`,
    "",
    "---",
    formatRawData(reading),
    "Analysis: Rule-based (LLM unavailable)",
  ].join("\n");
}
