export interface DoctorModuleConfig {
  url?: string;
  timeoutMs: number;
}

export interface ReconciliationConfig {
  enabled: boolean;
  maxAttempts: number;
}

export interface AppConfig {
  port: number;
  mongodb: { uri: string };
  doctorModule: DoctorModuleConfig;
  reconciliation: ReconciliationConfig;
}

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export default (): AppConfig => ({
  port: toInt(process.env.PORT, 3000),
  mongodb: {
    uri: process.env.MONGODB_URI || 'mongodb://localhost:27017/maternal-care',
  },
  doctorModule: {
    // Empty string counts as unset
    url: process.env.DOCTOR_MODULE_URL?.trim() || undefined,
    timeoutMs: toInt(process.env.DOCTOR_MODULE_TIMEOUT_MS, 10000),
  },
  reconciliation: {
    enabled: process.env.RECONCILIATION_ENABLED === 'true',
    maxAttempts: toInt(process.env.RECONCILIATION_MAX_ATTEMPTS, 5),
  },
});
