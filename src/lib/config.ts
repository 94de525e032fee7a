/**
 * Typed configuration module.
 * Validates environment variables at boot and provides typed access.
 */

// =============================================================================
// Environment variable validation
// =============================================================================

function required(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function optional(name: string, defaultValue: string = ''): string {
  return process.env[name] || defaultValue;
}

function optionalBool(name: string, defaultValue: boolean = false): boolean {
  const value = process.env[name];
  if (!value) return defaultValue;
  return value === 'true' || value === '1';
}

function optionalInt(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function optionalFloat(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

function optionalList(name: string): string[] {
  return optional(name, '')
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
}

// =============================================================================
// Configuration object
// =============================================================================

export interface PreviewConfig {
  width: number;
  height: number;
  quality: number;
  fetchTimeoutMs: number;
  barOpacity: number;
}

export interface Config {
  // Environment
  isDev: boolean;
  nodeEnv: string;

  // Server
  port: number;
  publicUrl: string;
  corsOrigin: string;

  // Database
  databaseUrl: string;
  useSqlite: boolean;
  sqlitePath: string;

  // Artifact storage
  supabaseUrl: string;
  supabaseServiceKey: string;
  supabaseStorageBucket: string;
  artifactsDir: string;
  workDir: string;

  // Submissions
  themeFileExtension: string;
  maxFileSizeBytes: number;
  browsePageSize: number;
  preview: PreviewConfig;

  // Collaborators
  adminIds: string[];
  billingSecret: string;
}

// Lazy-loaded config so tests can set env vars before first access
let _config: Config | null = null;

function loadConfig(): Config {
  const isDev = process.env.NODE_ENV !== 'production';
  const databaseUrl = optional('DATABASE_URL', '');

  // Use SQLite only if explicitly set OR if no DATABASE_URL in development
  const useSqliteEnv = optionalBool('USE_SQLITE', false);
  const useSqlite = useSqliteEnv || (!databaseUrl && isDev);

  if (!useSqlite && !databaseUrl && !isDev) {
    throw new Error('DATABASE_URL is required in production');
  }

  const port = optionalInt('PORT', 3000);
  const publicUrl = isDev
    ? optional('PUBLIC_URL', `http://localhost:${port}`)
    : required('PUBLIC_URL');

  return {
    isDev,
    nodeEnv: optional('NODE_ENV', 'development'),

    port,
    publicUrl: publicUrl.replace(/\/+$/, ''),
    corsOrigin: optional('CORS_ORIGIN', publicUrl),

    databaseUrl,
    useSqlite,
    sqlitePath: optional('DATABASE_PATH', './data/theme-depot.db'),

    supabaseUrl: optional('SUPABASE_URL', ''),
    supabaseServiceKey: optional('SUPABASE_SERVICE_KEY', '') || optional('SUPABASE_SERVICE_ROLE_KEY', ''),
    supabaseStorageBucket: optional('SUPABASE_STORAGE_BUCKET', 'themes'),
    artifactsDir: optional('ARTIFACTS_DIR', './data/artifacts'),
    workDir: optional('WORK_DIR', './data/tmp'),

    themeFileExtension: optional('THEME_FILE_EXTENSION', '.fptheme').toLowerCase(),
    maxFileSizeBytes: optionalInt('MAX_FILE_SIZE_MB', 5) * 1024 * 1024,
    browsePageSize: optionalInt('BROWSE_PAGE_SIZE', 5),
    preview: {
      width: optionalInt('PREVIEW_WIDTH', 1280),
      height: optionalInt('PREVIEW_HEIGHT', 720),
      quality: optionalInt('PREVIEW_QUALITY', 85),
      fetchTimeoutMs: optionalInt('PREVIEW_FETCH_TIMEOUT_MS', 10000),
      barOpacity: optionalFloat('PREVIEW_BAR_OPACITY', 0.85),
    },

    adminIds: optionalList('ADMIN_IDS'),
    billingSecret: optional('BILLING_SECRET', ''),
  };
}

/**
 * Get the application configuration.
 * Validates required environment variables on first access.
 */
export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

/**
 * Check if all required environment variables are set.
 * Call this at server startup to fail fast.
 */
export function validateConfig(): void {
  const config = getConfig();

  console.log('🔧 Configuration:');
  console.log(`   Environment: ${config.nodeEnv}`);
  console.log(`   Database: ${config.useSqlite ? `SQLite (${config.sqlitePath})` : 'PostgreSQL'}`);

  const hasSupabaseUrl = !!config.supabaseUrl;
  const hasSupabaseKey = !!config.supabaseServiceKey;
  if (hasSupabaseUrl && hasSupabaseKey) {
    console.log(`   Artifacts: Supabase (${config.supabaseStorageBucket})`);
  } else if (hasSupabaseUrl && !hasSupabaseKey) {
    console.log(`   Artifacts: Local disk (${config.artifactsDir})`);
    console.warn('   ⚠️  SUPABASE_URL is set but SUPABASE_SERVICE_KEY is missing - using local storage');
  } else {
    console.log(`   Artifacts: Local disk (${config.artifactsDir})`);
  }

  console.log(`   Theme files: *${config.themeFileExtension}, max ${config.maxFileSizeBytes} bytes`);
  console.log(`   Preview: ${config.preview.width}x${config.preview.height} @ q${config.preview.quality}`);
  console.log(`   Public URL: ${config.publicUrl}`);

  if (config.preview.barOpacity < 0 || config.preview.barOpacity > 1) {
    throw new Error(`PREVIEW_BAR_OPACITY must be within [0, 1], got ${config.preview.barOpacity}`);
  }
  if (config.preview.width <= 0 || config.preview.height <= 0) {
    throw new Error('PREVIEW_WIDTH and PREVIEW_HEIGHT must be positive');
  }

  if (!config.isDev) {
    if (config.useSqlite) {
      throw new Error('SQLite is not supported in production. Set DATABASE_URL.');
    }
    if (!config.billingSecret) {
      console.warn('   ⚠️  BILLING_SECRET not set - slot grants are disabled');
    }
    if (config.adminIds.length === 0) {
      console.warn('   ⚠️  ADMIN_IDS not set - admin routes are disabled');
    }
  }
}
