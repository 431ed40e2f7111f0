// Fallback Responses
// Deterministic templated answers used when the model backend cannot be reached

export type FallbackTopic = 'pressure' | 'temperature' | 'general';

const templates: Record<FallbackTopic, string[]> = {
  pressure: [
    'A pressure anomaly was detected. Take the following steps now:\n1. Inspect the pressure sensor\n2. Check valve positions\n3. Inspect the piping for leaks\n4. Run the safety protocol',
    'The pressure rise points to a valve malfunction. Contact maintenance and have valve V-001 inspected.',
    'The combined pressure readings exceed the normal range (1.0-3.5 bar). An immediate response is required.',
  ],
  temperature: [
    'A temperature sensor fault was confirmed. Follow this inspection procedure:\n1. Check the sensor cable connections\n2. Verify the calibration\n3. Measure the ambient temperature',
    'Sensor T-002 shows periodic spikes. Check for electrical interference or mechanical vibration.',
    'Replacing the temperature sensor is recommended. Its accuracy is outside the tolerated range.',
  ],
  general: [
    'The overall system check is complete. Most parameters are within range, but some components are due for routine maintenance.',
    'The shift handover check is complete. All safety systems are operating normally and there are no special notes.',
    'The system is in good condition. Carry out preventive maintenance at the next scheduled inspection.',
  ],
};

const TOPIC_KEYWORDS: Array<[FallbackTopic, string[]]> = [
  ['pressure', ['pressure', '압력']],
  ['temperature', ['temperature', '온도']],
];

export function detectTopic(prompt: string): FallbackTopic {
  const lower = prompt.toLowerCase();
  for (const [topic, keywords] of TOPIC_KEYWORDS) {
    if (keywords.some(k => lower.includes(k))) return topic;
  }
  return 'general';
}

// 32-bit FNV-1a
export function stableHash(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

export function selectFallbackTemplate(prompt: string): string {
  const options = templates[detectTopic(prompt)];
  return options[stableHash(prompt) % options.length];
}

export function buildFallbackResponse(prompt: string, modelName: string): string {
  return [
    '## Agent response (fallback mode)',
    '',
    selectFallbackTemplate(prompt),
    '',
    '### Recommended actions',
    '- Report to the owner of the affected system',
    '- Follow the applicable safety procedures',
    '- Record the outcome once the actions are complete',
    '',
    `Model: ${modelName} (fallback mode, backend unavailable)`,
  ].join('\n');
}
