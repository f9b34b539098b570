import type { GrowthStage, YieldTier } from "./yield.types";

export type KeywordFactor = {
  readonly keyword: string;
  readonly factor: number;
};

// Canonical crop keys are the Vietnamese names growers type in.
export const CROP_ALIASES: ReadonlyMap<string, string> = new Map([
  ["rice", "lúa"],
  ["maize", "ngô"],
  ["corn", "ngô"],
  ["bắp", "ngô"],
  ["coffee", "cà phê"],
  ["rubber", "cao su"],
  ["sugarcane", "mía"],
  ["cassava", "sắn"],
  ["khoai mì", "sắn"],
  ["sweet potato", "khoai lang"],
  ["soybean", "đậu tương"],
  ["đậu nành", "đậu tương"],
  ["peanut", "lạc"],
  ["đậu phộng", "lạc"],
  ["pepper", "hồ tiêu"],
  ["tiêu", "hồ tiêu"],
  ["cashew", "điều"],
]);

/** Tonnes per hectare under nominal conditions. */
export const BASE_YIELD_T_PER_HA: ReadonlyMap<string, number> = new Map([
  ["lúa", 5.5],
  ["ngô", 4.8],
  ["cà phê", 2.2],
  ["cao su", 1.8],
  ["mía", 60.0],
  ["sắn", 20.0],
  ["khoai lang", 12.0],
  ["đậu tương", 1.6],
  ["lạc", 2.3],
  ["hồ tiêu", 2.8],
  ["điều", 1.2],
]);

export const DEFAULT_BASE_YIELD_T_PER_HA = 4.0;

export const DEFAULT_GROWTH_DAYS = 90;
export const MIN_GROWTH_DAYS = 60;
export const MAX_GROWTH_DAYS = 180;

/** Lower bounds, highest first; the first bound not above the duration wins. */
export const GROWTH_FACTOR_STEPS: readonly { readonly minDays: number; readonly factor: number }[] = [
  { minDays: 150, factor: 1.2 },
  { minDays: 120, factor: 1.1 },
  { minDays: 100, factor: 1.0 },
  { minDays: 80, factor: 0.9 },
];

export const SHORT_SEASON_GROWTH_FACTOR = 0.7;

// Scanned in order, first substring match wins: organic, inorganic, NPK, manure, none.
export const FERTILIZER_FACTORS: readonly KeywordFactor[] = [
  { keyword: "hữu cơ", factor: 1.2 },
  { keyword: "vô cơ", factor: 1.1 },
  { keyword: "npk", factor: 1.15 },
  { keyword: "phân chuồng", factor: 1.18 },
  { keyword: "không", factor: 0.8 },
];

export const NO_FERTILIZER_KEYWORD = "không";

export const REGION_FACTORS: readonly KeywordFactor[] = [
  { keyword: "an giang", factor: 1.3 },
  { keyword: "đồng tháp", factor: 1.25 },
  { keyword: "cần thơ", factor: 1.2 },
  { keyword: "kiên giang", factor: 1.2 },
  { keyword: "long an", factor: 1.15 },
  { keyword: "thái bình", factor: 1.15 },
  { keyword: "đắk lắk", factor: 1.1 },
  { keyword: "lâm đồng", factor: 1.1 },
  { keyword: "gia lai", factor: 1.05 },
  { keyword: "nghệ an", factor: 0.95 },
  { keyword: "quảng trị", factor: 0.9 },
  { keyword: "ninh thuận", factor: 0.85 },
];

export const NEUTRAL_FACTOR = 1.0;

/** Thresholds in t/ha, highest first. */
export const YIELD_TIERS: readonly YieldTier[] = [
  { minYieldPerHa: 6, label: "Very High", color: "text-success", background: "bg-success-subtle" },
  { minYieldPerHa: 4, label: "High", color: "text-primary", background: "bg-primary-subtle" },
  { minYieldPerHa: 2, label: "Medium", color: "text-warning", background: "bg-warning-subtle" },
  { minYieldPerHa: 0, label: "Low", color: "text-danger", background: "bg-danger-subtle" },
];

export const CROP_RECOMMENDATIONS: ReadonlyMap<string, readonly string[]> = new Map([
  [
    "lúa",
    [
      "Duy trì mực nước 3-5 cm trong giai đoạn đẻ nhánh",
      "Bón thúc đạm vào 20-25 ngày sau sạ",
      "Theo dõi rầy nâu và bệnh đạo ôn định kỳ",
      "Thu hoạch khi 85-90% số hạt trên bông chín vàng",
    ],
  ],
  [
    "ngô",
    [
      "Vun gốc kết hợp bón thúc khi cây có 7-9 lá",
      "Tưới đủ ẩm giai đoạn trổ cờ và phun râu",
      "Phòng trừ sâu keo mùa thu từ sớm",
      "Thu hoạch khi lá bi khô và chân hạt có chấm đen",
    ],
  ],
  [
    "cà phê",
    [
      "Tưới đợt đầu khi mầm hoa phát triển đầy đủ",
      "Tỉa cành chồi vượt sau thu hoạch",
      "Bón phân NPK cân đối theo giai đoạn nuôi quả",
      "Hái khi trên 90% quả chín đỏ",
    ],
  ],
]);

export const GENERAL_RECOMMENDATIONS: readonly string[] = [
  "Kiểm tra độ ẩm đất thường xuyên",
  "Bón phân cân đối theo nhu cầu của cây",
  "Theo dõi sâu bệnh hàng tuần",
  "Ghi chép nhật ký canh tác đầy đủ",
];

export const MISSING_FERTILIZER_WARNING = "Chưa có thông tin phân bón, kết quả dự đoán có thể kém chính xác";

/** VND per kilogram. */
export const PRICE_PER_KG: ReadonlyMap<string, number> = new Map([
  ["lúa", 7_000],
  ["ngô", 6_500],
  ["cà phê", 45_000],
  ["cao su", 30_000],
  ["mía", 1_200],
  ["sắn", 3_000],
  ["khoai lang", 8_000],
  ["đậu tương", 15_000],
  ["lạc", 25_000],
  ["hồ tiêu", 90_000],
]);

export const DEFAULT_PRICE_PER_KG = 10_000;

/** VND per hectare per season. */
export const COST_PER_HA: ReadonlyMap<string, number> = new Map([
  ["lúa", 25_000_000],
  ["ngô", 20_000_000],
  ["cà phê", 60_000_000],
  ["cao su", 35_000_000],
  ["mía", 40_000_000],
]);

export const DEFAULT_COST_PER_HA = 15_000_000;

export const GROWTH_TIMELINE: readonly GrowthStage[] = [
  { stage: "Sowing", name: "Gieo trồng", progress: 100, tasks: ["Làm đất", "Xử lý hạt giống", "Gieo sạ"] },
  { stage: "Growth", name: "Sinh trưởng", progress: 75, tasks: ["Bón thúc", "Tưới nước", "Làm cỏ"] },
  { stage: "Flowering", name: "Ra hoa", progress: 50, tasks: ["Theo dõi sâu bệnh", "Bổ sung vi lượng"] },
  { stage: "Harvest", name: "Thu hoạch", progress: 25, tasks: ["Kiểm tra độ chín", "Thu hoạch", "Phơi sấy và bảo quản"] },
];
