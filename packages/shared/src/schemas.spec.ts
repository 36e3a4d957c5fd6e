import {
  ColumnarSongExportSchema,
  RatingRequestSchema,
  RatingSubscriptionSchema,
  SongListQuerySchema,
  SongSearchQuerySchema,
} from './schemas';

describe('shared schemas', () => {
  describe('RatingRequestSchema', () => {
    it.each([1, 3, 5])('should accept %p', (rating) => {
      expect(RatingRequestSchema.safeParse({ rating }).success).toBe(true);
    });

    it.each([0, 6, 2.5, '4', null])('should reject %p', (rating) => {
      expect(RatingRequestSchema.safeParse({ rating }).success).toBe(false);
    });
  });

  describe('SongListQuerySchema', () => {
    it('should default to the first page of ten', () => {
      expect(SongListQuerySchema.parse({})).toEqual({ page: 1, per_page: 10 });
    });

    it('should coerce query string values', () => {
      expect(SongListQuerySchema.parse({ page: '2', per_page: '25' })).toEqual({
        page: 2,
        per_page: 25,
      });
    });

    it.each([
      { page: '0' },
      { page: 'abc' },
      { per_page: '0' },
      { per_page: '101' },
    ])('should reject %p', (query) => {
      expect(SongListQuerySchema.safeParse(query).success).toBe(false);
    });
  });

  describe('SongSearchQuerySchema', () => {
    it('should keep the title exactly as given', () => {
      expect(SongSearchQuerySchema.parse({ title: '  night  ' })).toEqual({ title: '  night  ' });
    });

    it('should reject an empty or missing title', () => {
      expect(SongSearchQuerySchema.safeParse({ title: '' }).success).toBe(false);
      expect(SongSearchQuerySchema.safeParse({}).success).toBe(false);
    });
  });

  describe('ColumnarSongExportSchema', () => {
    it('should accept attribute to row index maps', () => {
      const data = { id: { '0': 'a' }, tempo: { '0': 120.5 }, mode: { '0': null } };

      expect(ColumnarSongExportSchema.parse(data)).toEqual(data);
    });

    it('should reject nested objects as cell values', () => {
      expect(ColumnarSongExportSchema.safeParse({ id: { '0': { nested: true } } }).success).toBe(
        false,
      );
    });
  });

  it('should require a songId to subscribe', () => {
    expect(RatingSubscriptionSchema.safeParse({}).success).toBe(false);
    expect(RatingSubscriptionSchema.parse({ songId: 'song-1' })).toEqual({ songId: 'song-1' });
  });
});
