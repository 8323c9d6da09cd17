const defaults: Record<string, string> = {
  PORT: '3000',
  LOG_LEVEL: 'silent',
  DISPATCH_RULES_PATH: 'config/dispatch-rules.example.json',
  TELNYX_API_KEY: 'test-secret',
  LIVEKIT_URL: 'http://localhost:7880',
  LIVEKIT_API_KEY: 'test-key',
  LIVEKIT_API_SECRET: 'test-secret',
  GLOBAL_CONCURRENCY_CAP: '30',
  TRUNK_CONCURRENCY_CAP_DEFAULT: '5',
  TRUNK_CALLS_PER_MIN_CAP_DEFAULT: '10',
  CAPACITY_TTL_SECONDS: '600',
  CAP_PREFIX: 'cap',
};

export function setTestEnv(): void {
  for (const [key, value] of Object.entries(defaults)) {
    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}
