import { describe, it, expect, vi, beforeEach } from 'vitest';

/**
 * ESM-safe mock: vi.mock is hoisted above imports by Vitest.
 */
vi.mock('../../src/infrastructure/db/index.js', () => ({
  findUserById: vi.fn(),
  findActiveReviewWithUser: vi.fn(),
  insertComment: vi.fn(),
  incrementCommentsCount: vi.fn(),
  queryCommentsByReview: vi.fn(),
}));

import { addComment, listComments } from '../../src/application/comment-service.js';
import {
  findUserById,
  findActiveReviewWithUser,
  insertComment,
  incrementCommentsCount,
  queryCommentsByReview,
} from '../../src/infrastructure/db/index.js';
import type { CommentRow, ReviewRow, UserRow, Database } from '../../src/infrastructure/db/index.js';
import { PRODUCT_ID, REVIEW_ID, USER_ID } from '../helpers.js';

const mockFindUser = vi.mocked(findUserById);
const mockFindActive = vi.mocked(findActiveReviewWithUser);
const mockInsertComment = vi.mocked(insertComment);
const mockIncrement = vi.mocked(incrementCommentsCount);
const mockQueryComments = vi.mocked(queryCommentsByReview);

const db = {} as Database;
const CREATED_AT = new Date('2026-02-18T12:00:00Z');

const USER: UserRow = { id: USER_ID, name: 'Commenter', email: 'c@example.test', profile: 'hello', created_at: CREATED_AT };
const REVIEW: ReviewRow = {
  id: REVIEW_ID,
  product_id: PRODUCT_ID,
  user_id: USER_ID,
  rating: 5,
  description: 'Great',
  status: 'active',
  created_at: CREATED_AT,
  updated_at: CREATED_AT,
};
const COMMENT: CommentRow = {
  id: '33333333-4444-5555-6666-777777777777',
  review_id: REVIEW_ID,
  user_id: USER_ID,
  description: 'Agreed',
  created_at: CREATED_AT,
};

beforeEach(() => {
  vi.clearAllMocks();
});

describe('addComment', () => {
  it('inserts the comment and bumps the counter', async () => {
    mockFindUser.mockResolvedValue(USER);
    mockFindActive.mockResolvedValue({ review: REVIEW, user: USER });
    mockInsertComment.mockResolvedValue(COMMENT);

    const result = await addComment(db, REVIEW_ID, { user_id: USER_ID, description: 'Agreed' });

    expect(mockInsertComment).toHaveBeenCalledWith(db, { review_id: REVIEW_ID, user_id: USER_ID, description: 'Agreed' });
    expect(mockIncrement).toHaveBeenCalledWith(db, REVIEW_ID);
    expect(result).toEqual({
      ok: true,
      value: {
        id: COMMENT.id,
        user_details: { id: USER_ID, name: 'Commenter', profile: 'hello' },
        description: 'Agreed',
        created_at: CREATED_AT,
      },
    });
  });

  it('returns not found for an unknown user', async () => {
    mockFindUser.mockResolvedValue(undefined);

    const result = await addComment(db, REVIEW_ID, { user_id: USER_ID, description: 'Agreed' });

    expect(result).toEqual({ ok: false, error: { code: 'NOT_FOUND', message: `User with ID ${USER_ID} not found` } });
    expect(mockInsertComment).not.toHaveBeenCalled();
  });

  it('returns not found for a deleted review', async () => {
    mockFindUser.mockResolvedValue(USER);
    mockFindActive.mockResolvedValue(undefined);

    const result = await addComment(db, REVIEW_ID, { user_id: USER_ID, description: 'Agreed' });

    expect(result).toEqual({ ok: false, error: { code: 'NOT_FOUND', message: `Review with ID ${REVIEW_ID} not found` } });
    expect(mockIncrement).not.toHaveBeenCalled();
  });
});

describe('listComments', () => {
  it('pages the comments of an active review', async () => {
    mockFindActive.mockResolvedValue({ review: REVIEW, user: USER });
    mockQueryComments.mockResolvedValue([{ comment: COMMENT, user: USER }]);

    const result = await listComments(db, REVIEW_ID, { page: 2, limit: 5 });

    expect(mockQueryComments).toHaveBeenCalledWith(db, REVIEW_ID, { limit: 5, offset: 5 });
    expect(result.ok ? result.value.comments.map((c) => c.id) : []).toEqual([COMMENT.id]);
  });

  it('returns not found for a missing review', async () => {
    mockFindActive.mockResolvedValue(undefined);

    const result = await listComments(db, REVIEW_ID, {});

    expect(result.ok).toBe(false);
    expect(mockQueryComments).not.toHaveBeenCalled();
  });
});
