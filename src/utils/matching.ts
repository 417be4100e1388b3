import { compareTwoStrings } from 'string-similarity';

/**
 * Identity key for a recognized track: lower-cased, trimmed, whitespace
 * collapsed. Two results with the same key are the same logical track.
 */
export function trackIdentity(title: string, artist: string): string {
  return `${collapse(title)}\u0000${collapse(artist)}`;
}

function collapse(value: string): string {
  return value.normalize('NFC').toLowerCase().replace(/\s+/g, ' ').trim();
}

export interface MatchCandidate {
  title: string;
  artists: string[];
}

export class SongMatcher {
  /**
   * Scores how well a catalogue candidate matches a recognized track, 0–100.
   */
  static computeConfidence(
    recognized: { title: string; artist: string },
    candidate: MatchCandidate
  ): number {
    // Extract featured artists from title
    const featured = this.extractFeaturedArtists(recognized.title);
    let recognizedArtist = recognized.artist;

    if (featured) {
      recognizedArtist += ', ' + featured;
    }

    const candidateArtist = candidate.artists.join(', ');

    const normalizedRecognizedArtist = this.normalize(recognizedArtist);
    const normalizedCandidateArtist = this.normalize(candidateArtist);
    const normalizedRecognizedTitle = this.normalize(this.cleanTitle(recognized.title));
    const normalizedCandidateTitle = this.normalize(this.cleanTitle(candidate.title));

    // Remixes and edits usually differ only in the bracketed part
    const recognizedTitleNoParens = this.stripParentheses(normalizedRecognizedTitle);
    const candidateTitleNoParens = this.stripParentheses(normalizedCandidateTitle);

    const artistScore = compareTwoStrings(normalizedRecognizedArtist, normalizedCandidateArtist);
    const titleScoreFull = compareTwoStrings(normalizedRecognizedTitle, normalizedCandidateTitle);
    const titleScoreNoParens = compareTwoStrings(recognizedTitleNoParens, candidateTitleNoParens);

    let titleScore = Math.max(titleScoreFull, titleScoreNoParens);

    if (
      this.hasPartialMatch(normalizedRecognizedTitle, normalizedCandidateTitle) ||
      this.hasPartialMatch(recognizedTitleNoParens, candidateTitleNoParens)
    ) {
      titleScore = Math.max(titleScore, 0.9);
    }

    return (artistScore * 0.6 + titleScore * 0.4) * 100;
  }

  static normalize(str: string): string {
    return str
      .normalize('NFD')
      .replace(/[\u0300-\u036f]/g, '') // Remove accents
      .replace(/&amp;/gi, ' and ')
      .replace(/&/g, ' and ')
      .replace(/[-–—_]/g, ' ')
      .replace(/[^a-z0-9 ()[\]]/gi, '')
      .replace(/\s+/g, ' ')
      .toLowerCase()
      .trim();
  }

  private static extractFeaturedArtists(title: string): string {
    const match = title.match(/(?:featuring|feat\.?|ft\.)(.*)/i);
    if (match) {
      return match[1].replace(/[^a-zA-Z0-9, ]/g, '').trim();
    }
    return '';
  }

  private static cleanTitle(title: string): string {
    return title
      .replace(/[([]?\s*(?:featuring|feat\.?|ft\.)[^)\]]*[)\]]?/i, '')
      .replace(/\s+/g, ' ')
      .trim();
  }

  private static stripParentheses(str: string): string {
    return str
      .replace(/[([].*?[)\]]/g, '')
      .replace(/\s+/g, ' ')
      .trim();
  }

  private static hasPartialMatch(str1: string, str2: string): boolean {
    if (str1.length < 4 || str2.length < 4) return false;
    return str1.includes(str2) || str2.includes(str1);
  }
}
