/**
 * Shared CTE fragments over COMPANY, PRICE and POSITION.
 *
 * Later fragments refer to earlier aliases, so the exported lists keep
 * dependency order.
 */

import type { NamedSubquery } from "../analytics/types.js";

/** Companies with an id, sector and ticker. */
export const TEMP_CLEAN_COMPANY: NamedSubquery = {
	alias: "TEMP_CLEAN_COMPANY",
	body: `
    SELECT DISTINCT *
    FROM COMPANY C
    WHERE
      C.ID IS NOT NULL AND
      C.SECTOR_NAME IS NOT NULL AND
      C.TICKER IS NOT NULL
  `,
};

/** Daily closes with every key field present. */
export const TEMP_CLEAN_PRICE: NamedSubquery = {
	alias: "TEMP_CLEAN_PRICE",
	body: `
    SELECT DISTINCT P.CLOSE_USD, P.COMPANY_ID, P.DATE
    FROM PRICE P
    WHERE
      P.CLOSE_USD IS NOT NULL AND
      P.DATE IS NOT NULL AND
      P.COMPANY_ID IS NOT NULL
  `,
};

/** Daily share counts with every key field present. */
export const TEMP_CLEAN_POSITION: NamedSubquery = {
	alias: "TEMP_CLEAN_POSITION",
	body: `
    SELECT DISTINCT *
    FROM POSITION PO
    WHERE
      PO.COMPANY_ID IS NOT NULL AND
      PO.DATE IS NOT NULL AND
      PO.SHARES IS NOT NULL
  `,
};

/**
 * Positions joined to their company and same-day close.
 *
 * LATEST_CLOSE_USD forward-fills a missing close with the most recent one on
 * or before the position date.
 */
export const TEMP_CLOSE_USD_CLEAN: NamedSubquery = {
	alias: "TEMP_CLOSE_USD_CLEAN",
	body: `
    SELECT
      C.TICKER,
      C.SECTOR_NAME,
      PO.COMPANY_ID,
      PO.SHARES,
      P.CLOSE_USD,
      PO.DATE,
      (
        SELECT LP.CLOSE_USD
        FROM TEMP_CLEAN_PRICE LP
        WHERE LP.COMPANY_ID = PO.COMPANY_ID AND LP.DATE <= PO.DATE
        ORDER BY LP.DATE DESC
        LIMIT 1
      ) AS LATEST_CLOSE_USD
    FROM TEMP_CLEAN_COMPANY C
    INNER JOIN TEMP_CLEAN_POSITION PO ON PO.COMPANY_ID = C.ID
    LEFT JOIN TEMP_CLEAN_PRICE P ON P.COMPANY_ID = PO.COMPANY_ID AND P.DATE = PO.DATE
  `,
};

/** Daily USD position per company, newest first. */
export const TEMP_CLOSE_USD_POSITIONS: NamedSubquery = {
	alias: "TEMP_CLOSE_USD_POSITIONS",
	body: `
    SELECT
      TICKER, COMPANY_ID, DATE, SECTOR_NAME,
      ROUND(SHARES * COALESCE(CLOSE_USD, LATEST_CLOSE_USD), 2) AS CLOSE_USD_POSITION
    FROM TEMP_CLOSE_USD_CLEAN
    ORDER BY DATE DESC
  `,
};

/** Everything needed to read TEMP_CLOSE_USD_CLEAN. */
export const CLEAN_POSITION_FRAGMENTS: readonly NamedSubquery[] = [
	TEMP_CLEAN_COMPANY,
	TEMP_CLEAN_PRICE,
	TEMP_CLEAN_POSITION,
	TEMP_CLOSE_USD_CLEAN,
];

/** Everything needed to read TEMP_CLOSE_USD_POSITIONS. */
export const USD_POSITION_FRAGMENTS: readonly NamedSubquery[] = [
	...CLEAN_POSITION_FRAGMENTS,
	TEMP_CLOSE_USD_POSITIONS,
];
