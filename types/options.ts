export type OptionType = 'call' | 'put';

export type OptionContract = {
  readonly spotPrice: number;
  readonly strikePrice: number;
  readonly timeToExpiration: number; // in years
  readonly riskFreeRate: number; // annualized, as decimal (e.g., 0.05)
  readonly volatility: number; // annualized, as decimal (e.g., 0.2)
  readonly optionType: OptionType;
  readonly dividendYield?: number; // continuous dividend yield, decimal
};

export type UnpricedOptionContract = Omit<OptionContract, 'volatility'>;

export type PricingGreekSet = {
  delta: number;
  gamma: number;
  theta: number; // per year
  vega: number; // per volatility point
  rho: number; // per rate point
};

export type PricingResult = PricingGreekSet & {
  price: number;
};

export type SurfaceGrid = {
  stockPrices: number[];
  times: number[]; // ascending, time remaining in years
  optionValues: number[][]; // [timeIndex][priceIndex]
  spotMarker: {
    priceIndex: number;
    timeIndex: number;
    value: number;
  };
};

export type SurfaceOptions = {
  priceRangePct?: number;
  timeHorizon?: number;
  minTime?: number;
  pricePoints?: number;
  timePoints?: number;
};

export type MarketQuote = {
  price: number;
};

export type OptionQuote = {
  ticker: string;
  optionType: OptionType;
  strikePrice: number;
  expirationDate: string;
  lastPrice?: number;
  bid?: number;
  ask?: number;
  impliedVolatility?: number;
};

export type TimeToExpirationInput =
  | { timeToExpiration: number }
  | { daysToExpiration: number }
  | { expiration: string };

export type ContractRequestBase = {
  ticker: string;
  optionType: OptionType;
  strikePrice: number;
  spotPrice?: number;
  volatility?: number;
  riskFreeRate?: number;
  dividendYield?: number;
};

export type ContractRequest = Omit<ContractRequestBase, 'volatility'> & TimeToExpirationInput;

export type OptionPricingRequestPayload = ContractRequestBase & TimeToExpirationInput;

export type SurfaceRequestPayload = OptionPricingRequestPayload & SurfaceOptions;

export type ImpliedVolatilityRequestPayload = ContractRequest & {
  marketPrice: number;
};

export type MarketAnalysisRequestPayload = OptionPricingRequestPayload & {
  marketPrice?: number; // looked up in the option chain when absent
};

export type ContractEcho = {
  ticker: string;
  optionType: OptionType;
  strikePrice: number;
  spotPrice: number;
  timeToExpiration: number;
  riskFreeRate: number;
  dividendYield: number;
};

export type OptionPricingResponsePayload = ContractEcho & {
  volatility: number;
  result: PricingResult;
};

export type SurfaceResponsePayload = {
  ticker: string;
  strikePrice: number;
  optionType: OptionType;
  volatility: number;
  currentPrice: number;
} & SurfaceGrid;

export type ImpliedVolatilityResponsePayload = ContractEcho & {
  marketPrice: number;
  impliedVolatility: number;
  iterations: number;
  method: 'newton' | 'bisection';
};

export type MarketAnalysis = {
  theoretical: PricingResult;
  marketPrice: number;
  difference: number; // positive = market above model
  percentDifference: number | null;
  moneyness: number;
  impliedVolatility: number | null;
  impliedVolatilityFailure: {
    reason: 'invalidQuote' | 'noConvergence';
    message: string;
  } | null;
};

export type MarketAnalysisResponsePayload = ContractEcho & {
  volatility: number;
} & MarketAnalysis;
