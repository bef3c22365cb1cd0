export interface ProviderInfoDto {
  key: string;
  minimumAmount: number;
  supportedCurrencies: readonly string[];
}
