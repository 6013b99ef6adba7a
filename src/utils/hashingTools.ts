import { compare as bcryptCompare, hash as bcryptHash } from "@node-rs/bcrypt";

// $2a$/$2b$/$2y$, cost 04-31, 22-char salt + 31-char checksum. The last
// character of each carries only padding bits, so it comes from a subset.
const BCRYPT_DIGEST_PATTERN =
	/^\$2[aby]\$(0[4-9]|[12]\d|3[01])\$[./A-Za-z0-9]{21}[.Oeu][./A-Za-z0-9]{30}[.CGKOSWaeimquy26]$/;

export interface PasswordHasher {
	hash(password: string): Promise<string>;
	verify(password: string, passwordHash: string): Promise<boolean>;
}

export const isBcryptDigest = (value: string): boolean =>
	BCRYPT_DIGEST_PATTERN.test(value);

export const createPasswordHasher = (saltRounds: number): PasswordHasher => ({
	hash: async (password) => {
		const passwordHash = await bcryptHash(password, saltRounds);
		return passwordHash;
	},

	verify: async (password, passwordHash) => {
		if (!isBcryptDigest(passwordHash)) {
			return false;
		}
		const isCorrect = await bcryptCompare(password, passwordHash);
		return isCorrect;
	},
});
