import { z } from 'zod';
import { defineTool } from './tools.js';

interface CityWeather {
  temp: number; // celsius
  condition: string;
  humidity: number;
}

// Static sample data; a real deployment would call a weather API here.
const WEATHER_DATA: Record<string, CityWeather> = {
  'New York': { temp: 22, condition: 'Sunny', humidity: 60 },
  London: { temp: 18, condition: 'Cloudy', humidity: 80 },
  Tokyo: { temp: 28, condition: 'Rainy', humidity: 75 },
  Sydney: { temp: 30, condition: 'Clear', humidity: 50 },
  Paris: { temp: 20, condition: 'Partly Cloudy', humidity: 65 },
  Berlin: { temp: 16, condition: 'Foggy', humidity: 70 },
  Moscow: { temp: 5, condition: 'Snowy', humidity: 85 },
  Dubai: { temp: 35, condition: 'Hot', humidity: 45 },
  'San Francisco': { temp: 19, condition: 'Foggy', humidity: 75 },
  Chicago: { temp: 15, condition: 'Windy', humidity: 60 },
};

export const KNOWN_CITIES: readonly string[] = Object.keys(WEATHER_DATA);

export function celsiusToFahrenheit(celsius: number): number {
  return Math.round((celsius * 9 / 5 + 32) * 10) / 10;
}

/**
 * Looks up the current weather for a city in the sample table.
 * Matching is case-insensitive; unknown cities get a "not available" sentence.
 */
export function lookupWeather(location: string, unit: string = 'celsius'): string {
  const key = KNOWN_CITIES.find((city) => city.toLowerCase() === location.toLowerCase());
  const data = key === undefined ? undefined : WEATHER_DATA[key];

  if (key === undefined || data === undefined) {
    return `Weather data for ${location} is not available.`;
  }

  const fahrenheit = unit.toLowerCase() === 'fahrenheit';
  // Fahrenheit always carries one decimal, celsius prints as stored
  const temp = fahrenheit ? celsiusToFahrenheit(data.temp).toFixed(1) : String(data.temp);

  return `The weather in ${key} is ${data.condition} with a temperature of ${temp}°${fahrenheit ? 'F' : 'C'} and humidity of ${data.humidity}%.`;
}

export const weatherTool = defineTool({
  name: 'get_weather',
  description: 'Get the current weather for a location.',
  parameters: {
    type: 'object',
    properties: {
      location: {
        type: 'string',
        description: 'The city or location to get weather for',
      },
      unit: {
        type: 'string',
        description: 'The temperature unit (celsius or fahrenheit)',
        default: 'celsius',
      },
    },
    required: ['location'],
  },
  schema: z.object({
    location: z.string(),
    unit: z.string().default('celsius'),
  }),
  execute: ({ location, unit }) => lookupWeather(location, unit),
});
