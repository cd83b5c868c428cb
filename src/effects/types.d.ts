import type {CommerceSettings} from '../types';

// ============================================================================
// Configuration
// ============================================================================

export type DatabaseConfig = {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
    readonly connectionTimeoutMillis: number;
    readonly queryTimeoutMillis: number;
    readonly applySchema: boolean;
}

export type EmailConfig = {
    readonly enabled: boolean;
    readonly host: string;
    readonly port: number;
    readonly from: string;
}

export type AwsConfig = {
    readonly region: string;
    readonly accessKeyId: string;
    readonly secretAccessKey: string;
    readonly monitoringEndpoint: string;
    readonly alertsTopicArn: string;
}

export type ApiConfig = {
    readonly port: number;
}

export type ProductionConfig = {
    readonly database: DatabaseConfig;
    readonly email: EmailConfig;
    readonly aws: AwsConfig;
    readonly api: ApiConfig;
    readonly commerce: CommerceSettings;
}
