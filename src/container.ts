type Factory<T> = () => T;

class Container {
  private factories = new Map<string, Factory<unknown>>();
  private instances = new Map<string, unknown>();

  register<T>(key: string, factory: Factory<T>): void {
    this.factories.set(key, factory);
  }

  resolve<T>(key: string): T {
    if (this.instances.has(key)) {
      return this.instances.get(key) as T;
    }

    const factory = this.factories.get(key);
    if (!factory) {
      throw new Error(`No factory registered for key: ${key}`);
    }

    const instance = factory() as T;
    this.instances.set(key, instance);
    return instance;
  }

  // For testing: clear all instances
  clearInstances(): void {
    this.instances.clear();
  }

  // For testing: override with a fake
  override<T>(key: string, instance: T): void {
    this.instances.set(key, instance);
  }
}

export const container = new Container();

export const KEYS = {
  // Data feed
  SLEEPER_CLIENT: 'sleeperClient',
  LEAGUE_DATA_FEED: 'leagueDataFeed',
  SEASON_DATA_SERVICE: 'seasonDataService',

  // Reports
  EFFICIENCY_SERVICE: 'efficiencyService',
  FAAB_SERVICE: 'faabService',
  ROSTER_CONSTRUCTION_SERVICE: 'rosterConstructionService',
  LUCK_SERVICE: 'luckService',
  STANDINGS_SERVICE: 'standingsService',
  DRAFT_ANALYSIS_SERVICE: 'draftAnalysisService',
  BENCHWARMERS_SERVICE: 'benchwarmersService',
  MATCHUPS_SERVICE: 'matchupsService',
  TRADES_SERVICE: 'tradesService',
} as const;
