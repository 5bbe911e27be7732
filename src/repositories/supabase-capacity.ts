/**
 * Capacity bound for the Supabase repositories: after an insert, rows beyond
 * `maxItems` are deleted oldest-first, the same policy as InMemoryStore.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseRepositoryOptions<Row> {
  maxItems: number;
  onEvict?: (row: Row) => void;
}

export async function evictOldest<Row>(
  db: SupabaseClient,
  table: string,
  options: SupabaseRepositoryOptions<Row>
): Promise<void> {
  const { count, error } = await db.from(table).select('*', { count: 'exact', head: true });
  if (error) throw new Error(`Failed to count ${table}: ${error.message}`);

  const excess = (count ?? 0) - options.maxItems;
  if (excess <= 0) return;

  const { data, error: deleteError } = await db
    .from(table)
    .delete()
    .in('id', await oldestIds(db, table, excess))
    .select();

  if (deleteError) throw new Error(`Failed to evict from ${table}: ${deleteError.message}`);
  for (const row of (data ?? []) as Row[]) {
    options.onEvict?.(row);
  }
}

async function oldestIds(db: SupabaseClient, table: string, n: number): Promise<string[]> {
  const { data, error } = await db
    .from(table)
    .select('id')
    .order('created_at', { ascending: true })
    .order('id', { ascending: true })
    .limit(n);

  if (error) throw new Error(`Failed to find oldest rows in ${table}: ${error.message}`);
  return ((data ?? []) as Array<{ id: string }>).map((r) => r.id);
}
