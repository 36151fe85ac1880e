export type AccountId = string;
export type AssetId = string;

export const COLLATERAL_DEPOSITED_ID = "collateral.deposited";
export type CollateralDeposited = {
	eventId: string;
	user: AccountId;
	asset: AssetId;
	amount: bigint;
	depositedAt: string; // ISO timestamp
};

export const COLLATERAL_REDEEMED_ID = "collateral.redeemed";
export type CollateralRedeemed = {
	eventId: string;
	from: AccountId;
	to: AccountId;
	asset: AssetId;
	amount: bigint;
	redeemedAt: string;
};

export const LIABILITY_MINTED_ID = "liability.minted";
export type LiabilityMinted = {
	eventId: string;
	user: AccountId;
	amount: bigint;
	mintedAt: string;
};

export const LIABILITY_BURNED_ID = "liability.burned";
export type LiabilityBurned = {
	eventId: string;
	onBehalfOf: AccountId;
	payer: AccountId;
	amount: bigint;
	burnedAt: string;
};

export const POSITION_LIQUIDATED_ID = "position.liquidated";
export type PositionLiquidated = {
	eventId: string;
	liquidator: AccountId;
	user: AccountId;
	asset: AssetId;
	debtCovered: bigint;
	collateralSeized: bigint;
	healthFactorBefore: bigint;
	healthFactorAfter: bigint;
	liquidatedAt: string;
};

export type EngineEvent =
	| { name: typeof COLLATERAL_DEPOSITED_ID; payload: CollateralDeposited }
	| { name: typeof COLLATERAL_REDEEMED_ID; payload: CollateralRedeemed }
	| { name: typeof LIABILITY_MINTED_ID; payload: LiabilityMinted }
	| { name: typeof LIABILITY_BURNED_ID; payload: LiabilityBurned }
	| { name: typeof POSITION_LIQUIDATED_ID; payload: PositionLiquidated };
