/**
 * Actions secret encryption (libsodium sealed box).
 *
 * @module
 */
import sodium from 'tweetsodium';
import { CollaboratorError } from '../errors.js';

export interface SecretEncryptor {
    /**
     * Encrypt `plaintext` for the repository public key.
     *
     * @returns base64 ciphertext, ready for `PUT .../actions/secrets/<name>`
     * @throws CollaboratorError (`encryption`) when the key is unusable
     */
    encrypt(publicKeyBase64: string, plaintext: string): string;
}

export function createSecretEncryptor(): SecretEncryptor {
    return {
        encrypt(publicKeyBase64, plaintext) {
            const keyBytes = Buffer.from(publicKeyBase64, 'base64');
            try {
                const encryptedBytes = sodium.seal(Buffer.from(plaintext), keyBytes);
                return Buffer.from(encryptedBytes).toString('base64');
            } catch (err) {
                throw new CollaboratorError('encryption', 'cannot encrypt secret with repository key', { cause: err });
            }
        },
    };
}
