import dotenv from 'dotenv';

dotenv.config();

export const config = {
  env: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '3000', 10),

  database: {
    url: process.env.DATABASE_URL || '',
    poolSize: parseInt(process.env.DATABASE_POOL_SIZE || '10', 10),
    migrationsDir: process.env.MIGRATIONS_DIR || 'backend/migrations',
  },

  supabase: {
    url: process.env.SUPABASE_URL || '',
    jwtSecret: process.env.SUPABASE_JWT_SECRET || '',
  },

  auth: {
    adminRole: process.env.ADMIN_ROLE || 'admin',
  },

  redis: {
    url: process.env.REDIS_URL || '',
    enabled: Boolean(process.env.REDIS_URL),
  },

  cache: {
    tagsTtl: parseInt(process.env.CACHE_TAGS_TTL || '600', 10),
  },
};

export type AppConfig = typeof config;
