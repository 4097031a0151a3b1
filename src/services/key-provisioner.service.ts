import { Inject, Injectable, Logger } from '@nestjs/common';
import * as crypto from 'crypto';
import * as sshpk from 'sshpk';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { KeyGenerationError } from './repo.errors';

export interface DeployKeyPair {
    /** OpenSSH authorized_keys line: `ssh-rsa <base64> <comment>`. */
    publicKey: string;
    /** PKCS#1 PEM. */
    privateKey: string;
    /** SHA256:... as printed by ssh-keygen -l. */
    fingerprint: string;
}

@Injectable()
export class KeyProvisionerService {
    private readonly logger = new Logger(KeyProvisionerService.name);

    constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) { }

    /**
     * Generate a fresh RSA key pair. Nothing is cached between calls.
     */
    generate(comment: string): DeployKeyPair {
        let pem: { publicKey: string; privateKey: string };
        try {
            pem = crypto.generateKeyPairSync('rsa', {
                modulusLength: this.config.keyBits,
                publicKeyEncoding: { type: 'spki', format: 'pem' },
                privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
            });
        } catch (e: unknown) {
            const reason = e instanceof Error ? e.message : String(e);
            this.logger.error(`RSA key generation failed: ${reason}`);
            throw new KeyGenerationError(`Key generation failed: ${reason}`, e);
        }

        let publicKey: string;
        let fingerprint: string;
        try {
            const key = sshpk.parseKey(pem.publicKey, 'pem');
            key.comment = comment;
            publicKey = key.toString('ssh');
            fingerprint = key.fingerprint('sha256').toString();
        } catch (e: unknown) {
            const reason = e instanceof Error ? e.message : String(e);
            this.logger.error(`Could not encode public key: ${reason}`);
            throw new KeyGenerationError(`Key generation failed: ${reason}`, e);
        }

        this.logger.log(`Generated ${this.config.keyBits}-bit deploy key ${fingerprint} for ${comment}`);
        return { publicKey, privateKey: pem.privateKey, fingerprint };
    }
}
