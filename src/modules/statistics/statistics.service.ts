import { storage } from "../../shared/db/storage";
import { summarizeSeasons, type SeasonStatistics } from "./season-statistics";

export class StatisticsService {
  static async forUser(userId: string): Promise<SeasonStatistics> {
    const seasons = await storage.seasons.list(userId);
    return summarizeSeasons(seasons);
  }
}
