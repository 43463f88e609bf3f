/**
 * Observance Policy v1
 *
 * Deterministic tithi/weekday rules for naming a day's observances.
 * Every rule that matches fires; overlapping observances are all kept.
 */

export type ObservanceName =
  | "Ekadashi"
  | "Pradosham"
  | "Amavasya"
  | "Purnima"
  | "Sankashti Chaturthi";

export interface ObservanceRule {
  name: ObservanceName;
  deity: string;
  description: string;
  /** Tithi indices (1–30) that trigger the rule */
  tithi_indices: number[];
  /** Restrict to these weekdays (0 = Sunday); omitted means any day */
  weekdays?: number[];
  /** Matching tags handed to the verse recommender */
  tags: string[];
}

export interface ObservancePolicyV1 {
  /** Policy version identifier (e.g., "observance_v1") */
  observance_policy_version: string;
  rules: ObservanceRule[];
}

export const OBSERVANCE_POLICY_V1: ObservancePolicyV1 = {
  observance_policy_version: "observance_v1",

  rules: [
    {
      name: "Ekadashi",
      deity: "Vishnu",
      description: "Fast and Vishnu worship",
      tithi_indices: [11, 26],
      tags: ["ekadashi", "vishnu", "fasting", "devotion"],
    },
    {
      // Soma (Monday) and Bhauma (Tuesday) Pradosham
      name: "Pradosham",
      deity: "Shiva",
      description: "Shiva puja during twilight",
      tithi_indices: [13, 28],
      weekdays: [1, 2],
      tags: ["pradosham", "shiva", "twilight", "trayodashi"],
    },
    {
      name: "Amavasya",
      deity: "Pitrus",
      description: "Tarpanam for ancestors",
      tithi_indices: [30],
      tags: ["amavasya", "pitru", "ancestors", "tarpanam"],
    },
    {
      name: "Purnima",
      deity: "All",
      description: "Full moon observance",
      tithi_indices: [15],
      tags: ["purnima", "full moon", "wholeness"],
    },
    {
      name: "Sankashti Chaturthi",
      deity: "Ganesha",
      description: "Ganesha vrata",
      tithi_indices: [19],
      tags: ["sankashti", "chaturthi", "ganesha", "obstacles"],
    },
  ],
};
