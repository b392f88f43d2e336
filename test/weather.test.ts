import { describe, expect, test } from 'vitest';
import { KNOWN_CITIES, celsiusToFahrenheit, lookupWeather, weatherTool } from '../src/weather.js';

describe('lookupWeather', () => {
  test('formats a known city in celsius by default', () => {
    expect(lookupWeather('Tokyo')).toBe(
      'The weather in Tokyo is Rainy with a temperature of 28°C and humidity of 75%.'
    );
  });

  test('matches city names case-insensitively and reports the canonical name', () => {
    expect(lookupWeather('san francisco')).toBe(
      'The weather in San Francisco is Foggy with a temperature of 19°C and humidity of 75%.'
    );
    expect(lookupWeather('NEW YORK', 'celsius')).toBe(
      'The weather in New York is Sunny with a temperature of 22°C and humidity of 60%.'
    );
  });

  test('converts to fahrenheit when asked, whatever the unit casing', () => {
    expect(lookupWeather('Tokyo', 'Fahrenheit')).toBe(
      'The weather in Tokyo is Rainy with a temperature of 82.4°F and humidity of 75%.'
    );
    expect(lookupWeather('moscow', 'fahrenheit')).toBe(
      'The weather in Moscow is Snowy with a temperature of 41.0°F and humidity of 85%.'
    );
    expect(lookupWeather('Dubai', 'Fahrenheit')).toBe(
      'The weather in Dubai is Hot with a temperature of 95.0°F and humidity of 45%.'
    );
  });

  test('falls back to celsius for any other unit', () => {
    expect(lookupWeather('Dubai', 'kelvin')).toBe(
      'The weather in Dubai is Hot with a temperature of 35°C and humidity of 45%.'
    );
  });

  test.each(KNOWN_CITIES)('fahrenheit reading for %s is the converted celsius reading', (city) => {
    const celsius = Number(/temperature of ([\d.]+)°C/.exec(lookupWeather(city))?.[1]);
    const fahrenheit = Number(/temperature of ([\d.]+)°F/.exec(lookupWeather(city, 'fahrenheit'))?.[1]);
    expect(fahrenheit).toBe(celsiusToFahrenheit(celsius));
    expect(fahrenheit).toBeCloseTo((celsius * 9) / 5 + 32, 5);
  });

  test.each(['Atlantis', '', 'Tokyo ', 'Lond'])('unknown location %j is not available', (location) => {
    expect(lookupWeather(location)).toBe(`Weather data for ${location} is not available.`);
    expect(lookupWeather(location, 'fahrenheit')).toBe(`Weather data for ${location} is not available.`);
  });

  test('knows exactly ten cities', () => {
    expect(KNOWN_CITIES).toHaveLength(10);
  });
});

describe('weatherTool', () => {
  test('exposes get_weather with location required', () => {
    expect(weatherTool.definition.name).toBe('get_weather');
    expect(weatherTool.definition.parameters).toMatchObject({ required: ['location'] });
  });

  test('runs the lookup from JSON arguments, defaulting the unit', async () => {
    await expect(weatherTool.run('{"location":"Paris"}')).resolves.toBe(
      'The weather in Paris is Partly Cloudy with a temperature of 20°C and humidity of 65%.'
    );
    await expect(weatherTool.run('{"location":"Berlin","unit":"fahrenheit"}')).resolves.toBe(
      'The weather in Berlin is Foggy with a temperature of 60.8°F and humidity of 70%.'
    );
  });

  test('rejects arguments that are not valid JSON', async () => {
    await expect(weatherTool.run('{location')).rejects.toThrow(
      'Arguments for get_weather are not valid JSON'
    );
  });

  test('rejects arguments missing the location', async () => {
    await expect(weatherTool.run('{"unit":"celsius"}')).rejects.toThrow(
      /^Invalid arguments for get_weather: location: /
    );
  });
});
