import type { Pool, PoolClient, QueryResultRow } from 'pg';
import type { NewCommentRow, ParkComment } from '../types/comment.js';
import type { NewParkRow, Park, ParkFilter, ParkStatus, VoteTally } from '../types/park.js';
import type { NewPhotoRow, ParkPhoto } from '../types/photo.js';
import type { NewTagRow, ParkTag } from '../types/tag.js';
import type { NewVoteRow, ParkVote } from '../types/vote.js';
import { NotFoundOrHiddenError } from '../utils/errors.js';
import type { ParkStore, VoteTransaction } from './store.js';

const PG_FOREIGN_KEY_VIOLATION = '23503';

// pg hands timestamptz columns back as Date objects.
type ParkRow = Omit<Park, 'created_at'> & { created_at: Date };
type VoteRow = Omit<ParkVote, 'created_at'> & { created_at: Date };
type PhotoRow = Omit<ParkPhoto, 'created_at'> & { created_at: Date };
type CommentRow = Omit<ParkComment, 'created_at'> & { created_at: Date };
type TagRow = ParkTag & QueryResultRow;
type TallyRow = VoteTally & QueryResultRow;

const withIsoDate = <T extends { created_at: Date }>(row: T): Omit<T, 'created_at'> & { created_at: string } => ({
  ...row,
  created_at: row.created_at.toISOString(),
});

const toTag = (row: TagRow): ParkTag => ({ id: row.id, park_id: row.park_id, tag: row.tag });

const hasPgCode = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code;

const PARK_COLUMNS = `id, name, description, latitude, longitude, address, status,
  created_at, created_by, upvotes, downvotes`;

class PostgresVoteTransaction implements VoteTransaction {
  constructor(
    private readonly client: PoolClient,
    readonly park: Park | null
  ) {}

  async insertVote(row: NewVoteRow): Promise<ParkVote | null> {
    const { rows } = await this.client.query<VoteRow>(
      `INSERT INTO park_votes (park_id, user_id, vote_type)
       VALUES ($1, $2, $3)
       ON CONFLICT (park_id, user_id) DO NOTHING
       RETURNING *`,
      [row.park_id, row.user_id, row.vote_type]
    );
    return rows[0] ? withIsoDate(rows[0]) : null;
  }

  async countVotes(parkId: string): Promise<VoteTally> {
    const { rows } = await this.client.query<TallyRow>(
      `SELECT count(*) FILTER (WHERE vote_type)::int AS upvotes,
              count(*) FILTER (WHERE NOT vote_type)::int AS downvotes
       FROM park_votes
       WHERE park_id = $1`,
      [parkId]
    );
    return rows[0] ? { upvotes: rows[0].upvotes, downvotes: rows[0].downvotes } : { upvotes: 0, downvotes: 0 };
  }

  async saveModeration(parkId: string, tally: VoteTally, status: ParkStatus): Promise<Park> {
    const { rows } = await this.client.query<ParkRow>(
      `UPDATE parks SET upvotes = $2, downvotes = $3, status = $4
       WHERE id = $1
       RETURNING ${PARK_COLUMNS}`,
      [parkId, tally.upvotes, tally.downvotes, status]
    );
    if (!rows[0]) {
      throw new Error(`Park ${parkId} vanished inside its vote transaction`);
    }
    return withIsoDate(rows[0]);
  }
}

/**
 * PostgreSQL store. Each vote runs in its own transaction holding a row lock
 * on the park, so concurrent votes on the same park apply one after another.
 */
export class PostgresStore implements ParkStore {
  constructor(private readonly pool: Pool) {}

  async insertPark(row: NewParkRow): Promise<Park> {
    const { rows } = await this.pool.query<ParkRow>(
      `INSERT INTO parks (name, description, latitude, longitude, address, created_by)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${PARK_COLUMNS}`,
      [row.name, row.description, row.latitude, row.longitude, row.address, row.created_by]
    );
    return withIsoDate(rows[0]);
  }

  async findPark(id: string): Promise<Park | null> {
    const { rows } = await this.pool.query<ParkRow>(
      `SELECT ${PARK_COLUMNS} FROM parks WHERE id = $1`,
      [id]
    );
    return rows[0] ? withIsoDate(rows[0]) : null;
  }

  async listParks(filter: ParkFilter = {}): Promise<Park[]> {
    const { rows } = filter.status
      ? await this.pool.query<ParkRow>(
          `SELECT ${PARK_COLUMNS} FROM parks WHERE status = $1 ORDER BY created_at DESC`,
          [filter.status]
        )
      : await this.pool.query<ParkRow>(`SELECT ${PARK_COLUMNS} FROM parks ORDER BY created_at DESC`);
    return rows.map(withIsoDate);
  }

  async setParkStatus(id: string, status: ParkStatus): Promise<Park | null> {
    const { rows } = await this.pool.query<ParkRow>(
      `UPDATE parks SET status = $2 WHERE id = $1 RETURNING ${PARK_COLUMNS}`,
      [id, status]
    );
    return rows[0] ? withIsoDate(rows[0]) : null;
  }

  async deletePark(id: string): Promise<boolean> {
    const { rowCount } = await this.pool.query('DELETE FROM parks WHERE id = $1', [id]);
    return (rowCount ?? 0) > 0;
  }

  async withVoteTransaction<T>(
    parkId: string,
    work: (tx: VoteTransaction) => Promise<T>
  ): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const { rows } = await client.query<ParkRow>(
        `SELECT ${PARK_COLUMNS} FROM parks WHERE id = $1 FOR UPDATE`,
        [parkId]
      );
      const tx = new PostgresVoteTransaction(client, rows[0] ? withIsoDate(rows[0]) : null);
      const result = await work(tx);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        console.error('Vote transaction rollback failed:', rollbackError);
      }
      throw error;
    } finally {
      client.release();
    }
  }

  async listVotes(parkId: string): Promise<ParkVote[]> {
    const { rows } = await this.pool.query<VoteRow>(
      'SELECT * FROM park_votes WHERE park_id = $1 ORDER BY created_at ASC',
      [parkId]
    );
    return rows.map(withIsoDate);
  }

  async insertPhoto(row: NewPhotoRow): Promise<ParkPhoto> {
    const rows = await this.insertChild<PhotoRow>(
      'INSERT INTO park_photos (park_id, url, uploaded_by) VALUES ($1, $2, $3) RETURNING *',
      [row.park_id, row.url, row.uploaded_by]
    );
    return withIsoDate(rows[0]);
  }

  async findPhoto(id: string): Promise<ParkPhoto | null> {
    const { rows } = await this.pool.query<PhotoRow>('SELECT * FROM park_photos WHERE id = $1', [id]);
    return rows[0] ? withIsoDate(rows[0]) : null;
  }

  async listPhotos(parkId: string): Promise<ParkPhoto[]> {
    const { rows } = await this.pool.query<PhotoRow>(
      'SELECT * FROM park_photos WHERE park_id = $1 ORDER BY created_at ASC',
      [parkId]
    );
    return rows.map(withIsoDate);
  }

  async setPhotoApproval(id: string, approved: boolean): Promise<ParkPhoto | null> {
    const { rows } = await this.pool.query<PhotoRow>(
      'UPDATE park_photos SET is_approved = $2 WHERE id = $1 RETURNING *',
      [id, approved]
    );
    return rows[0] ? withIsoDate(rows[0]) : null;
  }

  async deletePhoto(id: string): Promise<boolean> {
    const { rowCount } = await this.pool.query('DELETE FROM park_photos WHERE id = $1', [id]);
    return (rowCount ?? 0) > 0;
  }

  async insertComment(row: NewCommentRow): Promise<ParkComment> {
    const rows = await this.insertChild<CommentRow>(
      'INSERT INTO park_comments (park_id, user_id, content) VALUES ($1, $2, $3) RETURNING *',
      [row.park_id, row.user_id, row.content]
    );
    return withIsoDate(rows[0]);
  }

  async findComment(id: string): Promise<ParkComment | null> {
    const { rows } = await this.pool.query<CommentRow>('SELECT * FROM park_comments WHERE id = $1', [id]);
    return rows[0] ? withIsoDate(rows[0]) : null;
  }

  async listComments(parkId: string): Promise<ParkComment[]> {
    const { rows } = await this.pool.query<CommentRow>(
      'SELECT * FROM park_comments WHERE park_id = $1 ORDER BY created_at ASC',
      [parkId]
    );
    return rows.map(withIsoDate);
  }

  async setCommentReported(id: string, reported: boolean): Promise<ParkComment | null> {
    const { rows } = await this.pool.query<CommentRow>(
      'UPDATE park_comments SET is_reported = $2 WHERE id = $1 RETURNING *',
      [id, reported]
    );
    return rows[0] ? withIsoDate(rows[0]) : null;
  }

  async deleteComment(id: string): Promise<boolean> {
    const { rowCount } = await this.pool.query('DELETE FROM park_comments WHERE id = $1', [id]);
    return (rowCount ?? 0) > 0;
  }

  async insertTag(row: NewTagRow): Promise<ParkTag> {
    const rows = await this.insertChild<TagRow>(
      'INSERT INTO park_tags (park_id, tag) VALUES ($1, $2) RETURNING *',
      [row.park_id, row.tag]
    );
    return toTag(rows[0]);
  }

  async findTag(id: string): Promise<ParkTag | null> {
    const { rows } = await this.pool.query<TagRow>('SELECT * FROM park_tags WHERE id = $1', [id]);
    return rows[0] ? toTag(rows[0]) : null;
  }

  async listTags(parkId: string): Promise<ParkTag[]> {
    const { rows } = await this.pool.query<TagRow>(
      'SELECT * FROM park_tags WHERE park_id = $1 ORDER BY tag ASC',
      [parkId]
    );
    return rows.map(toTag);
  }

  async deleteTag(id: string): Promise<boolean> {
    const { rowCount } = await this.pool.query('DELETE FROM park_tags WHERE id = $1', [id]);
    return (rowCount ?? 0) > 0;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  // A park deleted between the visibility check and the insert surfaces as a
  // foreign key violation.
  private async insertChild<R extends object>(sql: string, params: unknown[]): Promise<R[]> {
    try {
      const { rows } = await this.pool.query<R & Record<string, unknown>>(sql, params);
      return rows;
    } catch (error) {
      if (hasPgCode(error, PG_FOREIGN_KEY_VIOLATION)) {
        throw new NotFoundOrHiddenError('Park');
      }
      throw error;
    }
  }
}
