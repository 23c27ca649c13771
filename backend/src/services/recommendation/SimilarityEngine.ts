import { Tag, UserProfile, Work } from '../../types/recommendation';

/**
 * Cosine similarity between a user's tag profile and a work's tags,
 * treating each tag set as a sparse vector keyed by tag name.
 */
export class SimilarityEngine {
  similarity(user: UserProfile, work: Work): number {
    const userNorm = this.norm(user.tags);
    const workNorm = this.norm(work.tags);
    if (userNorm === 0 || workNorm === 0) return 0;

    const userValues = this.toValueMap(user.tags);
    let dotProduct = 0;

    // Normalize before multiplying so large finite values cannot overflow
    for (const tag of work.tags) {
      const userValue = userValues.get(tag.name);
      if (userValue !== undefined) {
        dotProduct += (tag.value / workNorm) * (userValue / userNorm);
      }
    }

    return dotProduct;
  }

  private norm(tags: Tag[]): number {
    return Math.hypot(...tags.map(tag => tag.value));
  }

  // First occurrence of a name wins
  private toValueMap(tags: Tag[]): Map<string, number> {
    const values = new Map<string, number>();
    for (const tag of tags) {
      if (!values.has(tag.name)) {
        values.set(tag.name, tag.value);
      }
    }
    return values;
  }
}
