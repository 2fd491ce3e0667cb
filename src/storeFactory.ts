import type { StoreConfig } from './config.js';
import { CSVPriceStore } from './csvStorage.js';
import { GoogleSheetsStore, getServiceAccountToken, loadServiceAccountKey, type FetchLike } from './googleSheetsStore.js';
import type { PriceStore } from './priceSync.js';

export function createPriceStore(config: StoreConfig, fetchImpl: FetchLike = fetch): PriceStore {
  if (config.kind === 'csv') {
    return new CSVPriceStore(config.csvPath);
  }

  if (!config.spreadsheetId) {
    throw new Error('GOLD_SHEET_ID is required for the Google Sheets store (or pass --csv <path>)');
  }
  const credentials = { credentialsJson: config.credentialsJson, credentialsPath: config.credentialsPath };
  return new GoogleSheetsStore({
    spreadsheetId: config.spreadsheetId,
    worksheet: config.worksheet,
    fetchImpl,
    getAccessToken: async () => getServiceAccountToken(await loadServiceAccountKey(credentials), fetchImpl)
  });
}
