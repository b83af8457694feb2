import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { DataFormatError } from "../common/errors";
import { GymInput, GymRecord } from "../types/model/gym.model";
import { CATALOG_CONSTANTS } from "../utils/constants";

type CsvColumn = (typeof CATALOG_CONSTANTS.CSV_COLUMNS)[number];

export interface ParsedGymRow {
  /** 1-based data row position, header excluded. */
  row: number;
  input: GymInput;
}

const NUMERIC_COLUMNS = ["Latitude", "Longitude", "SubscriptionAmount"] as const;

// csv-parse tags its own errors with CSV_* codes
const isCsvError = (error: unknown): error is Error & { code: string } =>
  error instanceof Error &&
  "code" in error &&
  typeof error.code === "string" &&
  error.code.startsWith("CSV_");

export class GymCsvLoader {
  /**
   * Parses catalog CSV text into field values. Only structural problems
   * (missing columns, unparseable numbers, broken quoting) are raised here;
   * field rules are applied by the catalog.
   */
  public parse(text: string): ParsedGymRow[] {
    const table = this.readTable(text);
    if (table.length === 0) {
      return [];
    }

    const [header, ...rows] = table;
    const positions = this.resolveColumns(header);

    return rows.map((cells, index) => {
      const row = index + 1;
      const cell = (column: CsvColumn) =>
        (cells[positions.get(column) ?? -1] ?? "").trim();
      const numeric = (column: (typeof NUMERIC_COLUMNS)[number]) => {
        const raw = cell(column);
        const value = Number(raw);
        if (raw === "" || !Number.isFinite(value)) {
          throw new DataFormatError(
            `Row ${row}: ${column} "${raw}" is not a number`
          );
        }
        return value;
      };

      return {
        row,
        input: {
          partnerName: cell("PartnerName"),
          gymName: cell("GymName"),
          address: cell("Address"),
          pincode: this.normalizePincode(cell("Pincode")),
          latitude: numeric("Latitude"),
          longitude: numeric("Longitude"),
          subscriptionAmount: numeric("SubscriptionAmount"),
          amenities: this.splitAmenities(cell("Amenities")),
        },
      };
    });
  }

  public serialize(gyms: readonly GymRecord[]): string {
    return stringify(
      gyms.map((gym) => [
        gym.partnerName,
        gym.gymName,
        gym.address,
        gym.pincode,
        gym.latitude,
        gym.longitude,
        gym.subscriptionAmount,
        gym.amenities.join(CATALOG_CONSTANTS.AMENITY_SEPARATOR),
      ]),
      {
        header: true,
        columns: [...CATALOG_CONSTANTS.CSV_COLUMNS],
        record_delimiter: "windows",
      }
    );
  }

  public splitAmenities(value: string): string[] {
    return value
      .split(",")
      .map((amenity) => amenity.trim())
      .filter((amenity) => amenity.length > 0);
  }

  private readTable(text: string): string[][] {
    let parsed: unknown;
    try {
      parsed = parse(text, { bom: true, skip_empty_lines: true });
    } catch (error) {
      if (isCsvError(error)) {
        throw new DataFormatError(`Malformed CSV: ${error.message}`);
      }
      throw error;
    }

    if (!Array.isArray(parsed)) {
      throw new DataFormatError("Malformed CSV: expected rows");
    }
    return parsed.map((cells: unknown) =>
      Array.isArray(cells) ? cells.map((c: unknown) => String(c)) : []
    );
  }

  private resolveColumns(header: string[]): Map<CsvColumn, number> {
    const names = header.map((name) => name.trim());
    const missing = CATALOG_CONSTANTS.CSV_COLUMNS.filter(
      (column) => !names.includes(column)
    );
    if (missing.length > 0) {
      throw new DataFormatError(
        `Missing required columns: ${missing.join(", ")}`
      );
    }

    return new Map(
      CATALOG_CONSTANTS.CSV_COLUMNS.map((column): [CsvColumn, number] => [
        column,
        names.indexOf(column),
      ])
    );
  }

  private normalizePincode(value: string): string {
    if (/^\d+$/.test(value) && value.length < CATALOG_CONSTANTS.PINCODE_LENGTH) {
      return value.padStart(CATALOG_CONSTANTS.PINCODE_LENGTH, "0");
    }
    return value;
  }
}

export const gymCsvLoader = new GymCsvLoader();
