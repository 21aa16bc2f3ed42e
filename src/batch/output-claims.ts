/**
 * Output Claims
 *
 * Tracks which owner may write each path below the destination root, so
 * groups running side by side never write to the same file.
 */

export class OutputClaims {
  private readonly owners = new Map<string, string>();

  /**
   * Claim a path for an owner
   *
   * Returns false when another owner holds the path already.
   */
  claim(outputPath: string, owner: string): boolean {
    const current = this.owners.get(outputPath);
    if (current === undefined) {
      this.owners.set(outputPath, owner);
      return true;
    }
    return current === owner;
  }

  ownerOf(outputPath: string): string | undefined {
    return this.owners.get(outputPath);
  }

  get size(): number {
    return this.owners.size;
  }
}
