export const PG_CACHE_QUERIES = {
  PROBE: `
    SELECT 1 FROM cache_entries LIMIT 1
  `,

  GET: `
    SELECT value, expires_at > NOW() AS live
    FROM cache_entries
    WHERE cache_key = $1
  `,

  UPSERT: `
    INSERT INTO cache_entries (cache_key, value, expires_at)
    VALUES ($1, $2::jsonb, NOW() + make_interval(secs => $3))
    ON CONFLICT (cache_key) DO UPDATE
    SET value = EXCLUDED.value,
        expires_at = EXCLUDED.expires_at
  `,

  DELETE: `
    DELETE FROM cache_entries WHERE cache_key = $1
  `,

  CLEAR_NAMESPACE: `
    DELETE FROM cache_entries WHERE starts_with(cache_key, $1)
  `,

  COUNT_LIVE: `
    SELECT COUNT(*)::int AS count
    FROM cache_entries
    WHERE starts_with(cache_key, $1) AND expires_at > NOW()
  `,
} as const;
