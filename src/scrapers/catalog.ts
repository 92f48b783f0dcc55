export const SCRAPER_OPERATIONS = {
    yandex: ["statistics", "competitors", "reviews"],
    gis: ["statistics", "reviews", "reviews_summary", "send_answer", "complain", "post_picture"],
} as const;

export type ScraperType = keyof typeof SCRAPER_OPERATIONS;
export type OperationType<S extends ScraperType> = (typeof SCRAPER_OPERATIONS)[S][number];

/** Parameters each operation cannot run without. */
export const REQUIRED_PARAMS = {
    yandex: {
        statistics: ["target_id"],
        competitors: ["target_id"],
        reviews: ["target_id"],
    },
    gis: {
        statistics: ["target_id"],
        reviews: ["target_id"],
        reviews_summary: ["target_id"],
        send_answer: ["review_name", "answer_text"],
        complain: ["target_id", "review_id", "reason_text"],
        post_picture: ["target_id", "picture_url"],
    },
} satisfies { readonly [S in ScraperType]: { readonly [O in OperationType<S>]: readonly string[] } };

const requiredByName: Readonly<Record<string, Readonly<Record<string, readonly string[]>>>> = REQUIRED_PARAMS;

export function requiredParams(scraperType: string, operationType: string): readonly string[] {
    return requiredByName[scraperType]?.[operationType] ?? [];
}
