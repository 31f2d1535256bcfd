import { sum } from "../lib/numbers";
import { addValue, addWeighted, Bucket, engagedVisits, sumBuckets, valueOf, weightedAverage } from "./buckets";

export const VISITS = "visits";
export const LEADS = "leads";
export const BOUNCE_RATE = "bounceRate";

export type VisitDay = {
  date: string;
  visits: number;
  bounceRate: number;
  engaged: number;
  leads: number;
};

export type VisitTotals = {
  visits: number;
  leads: number;
  engaged: number;
  bounce_rate: number | null;
};

export type VisitSeries = {
  daily: VisitDay[];
  totals: VisitTotals;
};

export function addVisitRow(bucket: Bucket, visits: number, bounceRate: number, leads: number): void {
  addValue(bucket, VISITS, visits);
  addValue(bucket, LEADS, leads);
  addWeighted(bucket, BOUNCE_RATE, bounceRate, visits);
}

export function buildVisitSeries(byDate: Map<string, Bucket> | undefined, days: string[]): VisitSeries {
  const daily = days.map((date): VisitDay => {
    const bucket = byDate?.get(date);
    const visits = valueOf(bucket, VISITS);
    const bounceRate = weightedAverage(bucket, BOUNCE_RATE, 0);
    return {
      date,
      visits,
      bounceRate,
      engaged: engagedVisits(visits, bounceRate),
      leads: valueOf(bucket, LEADS),
    };
  });

  const inRange = days.map((date) => byDate?.get(date)).filter((b): b is Bucket => !!b);
  return {
    daily,
    totals: {
      visits: sum(daily.map((d) => d.visits)),
      leads: sum(daily.map((d) => d.leads)),
      engaged: sum(daily.map((d) => d.engaged)),
      bounce_rate: weightedAverage(sumBuckets(inRange), BOUNCE_RATE),
    },
  };
}
