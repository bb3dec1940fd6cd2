import { RegionProfile, SearchFilters } from "../core/dto";

// Region / section ids used by the listing site
//   region 1 (Taipei City): 1 Zhongzheng, 2 Datong, 3 Zhongshan, 4 Songshan,
//     5 Da'an, 6 Wanhua, 7 Xinyi, 8 Shilin, 9 Beitou, 10 Neihu,
//     11 Nangang, 12 Wenshan
//   region 3 (New Taipei City): 37 Yonghe, 43 Sanchong

export const COMMON_FILTERS: SearchFilters = {
  kind: 1, // whole-floor home
  layouts: [2, 3, 4],
  price: [0, 30000],
  area: [10, 50],
  other: ["not_cover", "near_subway", "cook"], // elevator is checked after the search
  options: ["cold", "washer", "icebox"],
  order: "posttime",
  orderType: "desc",
};

export const SEARCH_PROFILES: RegionProfile[] = [
  {
    label: "台北市（排除內湖/北投）",
    region: 1,
    sections: [1, 2, 3, 4, 5, 6, 7, 8, 11, 12],
    filters: COMMON_FILTERS,
  },
  {
    label: "新北永和區",
    region: 3,
    sections: [37],
    filters: COMMON_FILTERS,
  },
  {
    label: "新北三重區",
    region: 3,
    sections: [43],
    filters: COMMON_FILTERS,
  },
];
