import { DataFormatError } from "../common/errors";
import { GymRecord } from "../types/model/gym.model";
import { GymCsvLoader } from "./gymCsv.loader";

const HEADER =
  "PartnerName,GymName,Address,Pincode,Latitude,Longitude,SubscriptionAmount,Amenities";

describe("GymCsvLoader", () => {
  const loader = new GymCsvLoader();

  describe("parse", () => {
    it("maps columns to fields and splits amenities", () => {
      const rows = loader.parse(
        `${HEADER}\nCult, Cult Andheri ,"10 Station Road, Andheri",400069,19.1147,72.8706,2499,"Cardio, Weights , Showers"\n`
      );

      expect(rows).toEqual([
        {
          row: 1,
          input: {
            partnerName: "Cult",
            gymName: "Cult Andheri",
            address: "10 Station Road, Andheri",
            pincode: "400069",
            latitude: 19.1147,
            longitude: 72.8706,
            subscriptionAmount: 2499,
            amenities: ["Cardio", "Weights", "Showers"],
          },
        },
      ]);
    });

    it("accepts columns in any order", () => {
      const [first] = loader.parse(
        "Amenities,SubscriptionAmount,Longitude,Latitude,Pincode,Address,GymName,PartnerName\n" +
          "Yoga,1999,72.83,19.06,400050,Hill Road,Snap Bandra,Snap Fitness\n"
      );
      expect(first.input.partnerName).toBe("Snap Fitness");
      expect(first.input.latitude).toBe(19.06);
      expect(first.input.amenities).toEqual(["Yoga"]);
    });

    it("restores leading zeros a spreadsheet dropped from the pincode", () => {
      const [first] = loader.parse(`${HEADER}\nCult,Cult A,Addr,11001,28.6,77.2,999,\n`);
      expect(first.input.pincode).toBe("011001");
      expect(first.input.amenities).toEqual([]);
    });

    it("returns no rows for an empty document", () => {
      expect(loader.parse("")).toEqual([]);
      expect(loader.parse(`${HEADER}\n`)).toEqual([]);
    });

    it("names every missing column", () => {
      expect(() => loader.parse("PartnerName,GymName,Address\nCult,A,B\n")).toThrow(
        new DataFormatError(
          "Missing required columns: Pincode, Latitude, Longitude, SubscriptionAmount, Amenities"
        )
      );
    });

    it("rejects a row whose coordinates do not parse", () => {
      const text =
        `${HEADER}\n` +
        "Cult,A,Addr,400069,19.1,72.8,2499,Yoga\n" +
        "Cult,B,Addr,400069,north,72.8,2499,Yoga\n";
      expect(() => loader.parse(text)).toThrow('Row 2: Latitude "north" is not a number');
    });

    it("rejects an empty amount", () => {
      const text = `${HEADER}\nCult,A,Addr,400069,19.1,72.8,,Yoga\n`;
      expect(() => loader.parse(text)).toThrow(DataFormatError);
    });

    it("reports broken CSV structure as a data format problem", () => {
      const text = `${HEADER}\nCult,A,Addr\n`;
      expect(() => loader.parse(text)).toThrow(DataFormatError);
    });
  });

  describe("serialize", () => {
    const gym: GymRecord = {
      id: 4,
      partnerName: "Gold's Gym",
      gymName: "Gold's Gym Powai",
      address: "12 Lake Road, Powai",
      pincode: "400076",
      latitude: 19.1193,
      longitude: 72.9065,
      subscriptionAmount: 2999,
      amenities: ["Weights", "Sauna"],
    };

    it("writes the catalog header, CRLF endings and minimal quoting", () => {
      expect(loader.serialize([gym])).toBe(
        `${HEADER}\r\n` +
          `Gold's Gym,Gold's Gym Powai,"12 Lake Road, Powai",400076,19.1193,72.9065,2999,"Weights, Sauna"\r\n`
      );
    });

    it("reads back what it writes", () => {
      const [row] = loader.parse(loader.serialize([gym]));
      const { id, ...input } = gym;
      expect(id).toBe(4);
      expect(row.input).toEqual(input);
    });
  });
});
