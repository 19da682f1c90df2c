import "dotenv/config";

export interface AppConfig {
  // Server Configuration
  port: number;
  host: string;

  // Groq Configuration
  groqApiKey: string;
  groqModel: string;
  groqTimeoutMs: number;
  modelTemperature: number;

  // Document Configuration
  documentCharLimit: number;
  extractionTimeoutMs: number;
  pdfMaxPages: number;
  pdfExtractConcurrency: number;
  uploadMaxSizeBytes: number;

  // Environment Detection
  isDevelopment: boolean;
  isProduction: boolean;
}

function getEnvString(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (!value && defaultValue === undefined) {
    throw new Error(`Required environment variable ${key} is not set`);
  }
  return value || defaultValue || "";
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a valid number`);
  }
  return parsed;
}

export const config: AppConfig = {
  // Server Configuration
  port: getEnvNumber("PORT", 8787),
  host: getEnvString("HOST", "localhost"),

  // Groq Configuration
  groqApiKey: getEnvString("GROQ_API_KEY", ""),
  groqModel: getEnvString(
    "GROQ_MODEL",
    "meta-llama/llama-4-maverick-17b-128e-instruct"
  ),
  groqTimeoutMs: Math.max(1000, getEnvNumber("GROQ_TIMEOUT_MS", 45000)),
  modelTemperature: 0.1,

  // Document Configuration
  documentCharLimit: 5000,
  extractionTimeoutMs: Math.max(
    1000,
    getEnvNumber("EXTRACTION_TIMEOUT_MS", 30000)
  ),
  pdfMaxPages: Math.max(1, getEnvNumber("PDF_MAX_PAGES", 200)),
  pdfExtractConcurrency: Math.max(
    1,
    getEnvNumber("PDF_EXTRACT_CONCURRENCY", 2)
  ),
  uploadMaxSizeBytes: 10 * 1024 * 1024, // 10MB

  // Environment Detection
  isDevelopment: process.env.NODE_ENV === "development",
  isProduction: process.env.NODE_ENV === "production",
};

if (!config.groqApiKey && config.isProduction) {
  console.warn(
    "Warning: GROQ_API_KEY is not set. AI actions will fail until it is configured."
  );
}

export default config;
