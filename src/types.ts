export interface User {
  id: string;
  email: string;
  username: string;
  passwordHash: string;
  fullName?: string;
  balance: number;
  createdAt: string;
  updatedAt: string;
}

export type PublicUser = Omit<User, "passwordHash" | "updatedAt">;

export interface NewUser {
  email: string;
  username: string;
  password: string;
  fullName?: string;
  balance: number;
}

export interface Stock {
  symbol: string;
  name: string;
  currentPrice: number;
  previousClose?: number;
  dayHigh?: number;
  dayLow?: number;
  volume: number;
  marketCap?: number;
  sector?: string;
  updatedAt: string;
}

export interface StockSeed {
  symbol: string;
  name: string;
  price: number;
  sector?: string;
  marketCap?: number;
}

export type PriceUpdate = Pick<Stock, "currentPrice" | "dayHigh" | "dayLow" | "volume">;

export interface PriceChange {
  change: number;
  changePercent: number;
}

export type StockView = Stock & PriceChange;

export type OrderType = "market" | "limit";
export type OrderSide = "buy" | "sell";
export type OrderStatus = "pending" | "filled" | "partially_filled" | "cancelled" | "rejected";

export interface Order {
  id: string;
  userId: string;
  symbol: string;
  orderType: OrderType;
  side: OrderSide;
  quantity: number;
  limitPrice?: number;
  filledQuantity: number;
  filledPrice?: number;
  status: OrderStatus;
  createdAt: string;
  updatedAt: string;
}

export interface NewOrder {
  symbol: string;
  orderType: OrderType;
  side: OrderSide;
  quantity: number;
  limitPrice?: number;
}

export type OrderPatch = Partial<Pick<Order, "status" | "filledQuantity" | "filledPrice">>;

export interface Holding {
  userId: string;
  symbol: string;
  quantity: number;
  averageBuyPrice: number;
}

export interface HoldingView {
  symbol: string;
  quantity: number;
  averageBuyPrice: number;
  currentPrice: number;
  currentValue: number;
  totalGainLoss: number;
  gainLossPercent: number;
}

export interface PortfolioSummary {
  cashBalance: number;
  totalHoldingsValue: number;
  totalPortfolioValue: number;
  totalGainLoss: number;
  holdings: HoldingView[];
}

export interface WatchlistItem {
  id: string;
  userId: string;
  symbol: string;
  addedAt: string;
}

export interface WatchlistView {
  id: string;
  symbol: string;
  addedAt: string;
  currentPrice: number | null;
  change: number;
  changePercent: number;
}

export type AlertCondition = "above" | "below";

export interface PriceAlert {
  id: string;
  userId: string;
  symbol: string;
  targetPrice: number;
  condition: AlertCondition;
  isTriggered: boolean;
  isActive: boolean;
  createdAt: string;
  triggeredAt?: string;
}

export interface NewPriceAlert {
  symbol: string;
  targetPrice: number;
  condition: AlertCondition;
}

export type PriceAlertView = Omit<PriceAlert, "userId" | "triggeredAt"> & {
  triggeredAt: string | null;
  currentPrice: number | null;
};

export interface LiveQuote {
  symbol: string;
  name: string;
  price: number;
  dayHigh?: number;
  dayLow?: number;
  volume?: number;
}

export interface TriggeredAlert {
  alert: PriceAlert;
  currentPrice: number;
}

export type ChaosScenario = "chaos_data" | "chaos_stress" | "chaos_race";

export interface ChaosResult {
  scenario: ChaosScenario | null;
  actions: string[];
  corruptedStocks?: { symbol: string; issue: string }[];
  stressUser?: { username: string; password: string };
}

export interface ScenarioSetup {
  pre_populate_alerts?: number;
  artificial_delay_ms?: number;
  enable_concurrent_test_endpoint?: boolean;
}

export interface ScenarioConfig {
  id: string;
  name: string;
  description: string;
  difficulty?: string;
  challenges?: string[];
  setup?: ScenarioSetup;
}
