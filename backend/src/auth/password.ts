import bcrypt from "bcryptjs";

export class PasswordHasher {
  private readonly decoyHash: string;

  constructor(private readonly rounds: number) {
    this.decoyHash = bcrypt.hashSync("decoy-password-never-matches", rounds);
  }

  hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.rounds);
  }

  verify(password: string, passwordHash: string): Promise<boolean> {
    return bcrypt.compare(password, passwordHash);
  }

  /** Spends the same work as a real check so unknown emails answer in comparable time. */
  async verifyAgainstDecoy(password: string): Promise<false> {
    await bcrypt.compare(password, this.decoyHash);
    return false;
  }
}
