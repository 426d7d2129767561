// ============================================================================
// Configuration
// ============================================================================

export type DatabaseConfig = {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
}

export type StoreDriver = 'postgres' | 'memory';

export type DispatchDriver = 'webhook' | 'email' | 'log';

export type MonitoringDriver = 'aws' | 'log';

export type WebhookConfig = {
    readonly url: string;
    readonly timeoutMs: number;
}

export type EmailConfig = {
    readonly host: string;
    readonly port: number;
    readonly from: string;
    readonly dispatchTo: string;
}

export type AwsConfig = {
    readonly region: string;
    readonly accessKeyId: string;
    readonly secretAccessKey: string;
    readonly endpoint: string;
    readonly alertTopicArn: string;
}

export type ShopConfig = {
    readonly ownerId: string | null;
    readonly orderCodePrefix: string;
    readonly freeZone: string;
    readonly globalDiscount: number;
    readonly globalDiscountActive: boolean;
    readonly promoCode: string | null;
    readonly promoAmount: number;
    readonly seedDemoCatalog: boolean;
}

export type ProductionConfig = {
    readonly store: StoreDriver;
    readonly database: DatabaseConfig;
    readonly dispatch: DispatchDriver;
    readonly webhook: WebhookConfig;
    readonly email: EmailConfig;
    readonly monitoring: MonitoringDriver;
    readonly aws: AwsConfig;
    readonly shop: ShopConfig;
    readonly apiPort: number;
}
