import type { AgentCard } from './a2aTypes.js';
import { SUPPORTED_CONTENT_TYPES } from './WeatherAgent.js';

export function buildAgentCard(host: string, port: number): AgentCard {
  return {
    name: 'Weather Assistant',
    description: 'A weather assistant that can provide current weather information.',
    url: `http://${host}:${port}/`,
    version: '1.0.0',
    defaultInputModes: [...SUPPORTED_CONTENT_TYPES],
    defaultOutputModes: [...SUPPORTED_CONTENT_TYPES],
    capabilities: { streaming: true, pushNotifications: false, stateTransitionHistory: false },
    skills: [
      {
        id: 'weather_information',
        name: 'Weather Information',
        description: 'Provides current weather information for locations around the world.',
        tags: ['weather', 'forecast'],
        examples: [
          "What's the weather like in New York?",
          'Is it raining in London?',
          'Temperature in Tokyo',
          "How's the weather in Paris?",
          "What's the humidity in Sydney?",
        ],
      },
    ],
  };
}
