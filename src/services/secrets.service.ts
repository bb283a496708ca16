import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';

export interface AppSecrets {
  TMDB_API_KEY: string;
  TVDB_API_KEY: string;
}

class SecretsService {
  private client: SecretsManagerClient;
  private secretName = 'media-organizer/api-keys';
  private cachedSecrets: AppSecrets | null = null;
  private region = process.env.AWS_REGION || 'us-east-1';

  constructor() {
    this.client = new SecretsManagerClient({ region: this.region });
  }

  async getSecrets(): Promise<AppSecrets> {
    if (this.cachedSecrets) {
      return this.cachedSecrets;
    }

    if (process.env.USE_LOCAL_SECRETS === 'true') {
      console.log('Using local .env secrets (USE_LOCAL_SECRETS=true)');
      return this.getLocalSecrets();
    }

    try {
      console.log(`Fetching secrets from AWS Secrets Manager: ${this.secretName}`);

      const response = await this.client.send(
        new GetSecretValueCommand({ SecretId: this.secretName })
      );

      if (!response.SecretString) {
        throw new Error('Secret value is empty');
      }

      this.cachedSecrets = this.parseSecrets(response.SecretString);
      console.log('Secrets loaded successfully from AWS Secrets Manager');

      return this.cachedSecrets;
    } catch (error) {
      console.warn('Failed to fetch from AWS Secrets Manager, falling back to local .env');
      console.warn(error instanceof Error ? error.message : error);
      return this.getLocalSecrets();
    }
  }

  private parseSecrets(secretString: string): AppSecrets {
    const parsed: unknown = JSON.parse(secretString);
    const record: Record<string, unknown> =
      typeof parsed === 'object' && parsed !== null ? { ...parsed } : {};

    const read = (key: keyof AppSecrets): string => {
      const value = record[key];
      return typeof value === 'string' ? value : process.env[key] || '';
    };

    return {
      TMDB_API_KEY: read('TMDB_API_KEY'),
      TVDB_API_KEY: read('TVDB_API_KEY'),
    };
  }

  private getLocalSecrets(): AppSecrets {
    const secrets: AppSecrets = {
      TMDB_API_KEY: process.env.TMDB_API_KEY || '',
      TVDB_API_KEY: process.env.TVDB_API_KEY || '',
    };

    // Both providers are optional, but without either one every lookup misses
    if (!secrets.TMDB_API_KEY && !secrets.TVDB_API_KEY) {
      console.warn('No TMDB_API_KEY or TVDB_API_KEY provided. Limited metadata will be available.');
    }

    this.cachedSecrets = secrets;
    return secrets;
  }

  clearCache(): void {
    this.cachedSecrets = null;
  }
}

export const secretsService = new SecretsService();
