const defaults: Record<string, string> = {
  PORT: '3000',
  LOG_LEVEL: 'silent',
  STATE_STORE: 'memory',
  WEBHOOK_DESTINATION_URL: 'http://localhost/webhook',
  WEBHOOK_SIGNING_SECRET: 'test-secret',
};

export function setTestEnv(): void {
  for (const [key, value] of Object.entries(defaults)) {
    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}
