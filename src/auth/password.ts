import * as argon2 from "argon2";
import type { PasswordHashingConfig } from "../config";

export class PasswordHasher {
  constructor(private readonly options: PasswordHashingConfig) {}

  hash(password: string): Promise<string> {
    return argon2.hash(password, {
      type: argon2.argon2id,
      timeCost: this.options.timeCost,
      memoryCost: this.options.memoryCost,
      parallelism: this.options.parallelism,
    });
  }

  /** False for a wrong password and for a hash argon2 cannot parse. */
  async verify(hash: string, password: string): Promise<boolean> {
    try {
      return await argon2.verify(hash, password);
    } catch (err) {
      console.error("password verify failed", err);
      return false;
    }
  }
}
