import * as dotenv from "dotenv";
dotenv.config();

export const POLICY_CSV_PATH = process.env.POLICY_CSV_PATH || "data/insurance_policies.csv";

// Identifier as it appears in a serialized row ("policy_id: POL001")
export const POLICY_ID_FIELD_RX = /policy_id: (POL\d+)/;
