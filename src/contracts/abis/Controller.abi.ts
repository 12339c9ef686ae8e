export const CONTROLLER_ABI = [
  'event Borrow(address indexed user, uint256 collateral_increase, uint256 loan_increase)',
  'event Repay(address indexed user, uint256 collateral_decrease, uint256 loan_decrease)',
  'event SoftLiquidation(address indexed liquidator, address indexed user, uint256 collateral_sold, uint256 stablecoin_received, uint256 debt_covered)',
  'event Liquidate(address indexed liquidator, address indexed user, uint256 collateral_received, uint256 stablecoin_received, uint256 debt)',
  'event UserState(address indexed user, uint256 collateral, uint256 debt, int256 n1, int256 n2, uint256 liquidation_discount)',
  'function liquidation_discount() view returns (uint256)',
] as const;
