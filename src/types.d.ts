// Non domain types

export type DispatchNotice = {
  readonly code: string;
  readonly items: readonly { readonly name: string; readonly quantity: number }[];
  readonly city: string;
  readonly distanceKm: number;
  readonly address: string;
  readonly total: number;
};

export type NotificationPayload = {
  readonly subject: string;
  readonly body: string;
};

export type StockReconciliationAlert = {
  readonly type: 'stock_reconciliation';
  readonly orderCode: string;
  readonly productName: string;
  readonly available: number;
};

export type DispatchFailedAlert = {
  readonly type: 'dispatch_failed';
  readonly orderCode: string;
  readonly reason: string;
};

export type MonitoringAlert = StockReconciliationAlert | DispatchFailedAlert;
