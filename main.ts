import { Config } from './src/config.js';
import { FeedGenerator } from './src/feed-generator.js';
import { MockUntisManager } from './src/mock-untis-manager.js';
import { startServer } from './src/server.js';
import { Store } from './src/store.js';
import { TimetableCoordinator } from './src/timetable-coordinator.js';
import { UntisManager, type UntisConnection } from './src/untis-manager.js';

const main = async (): Promise<void> => {
    const config = new Config();

    const connection: UntisConnection = {
        school: config.untisSchool,
        username: config.untisUser,
        password: config.untisSecret,
        server: config.untisServer,
        timetableSource: config.timetableSource,
        sourceName: config.sourceName,
        keepLoggedIn: config.keepLoggedIn,
    };
    const untisManager = config.mock ? new MockUntisManager(connection) : new UntisManager(connection);

    const store = new Store();
    const coordinator = new TimetableCoordinator(store, untisManager, {
        label: `${config.untisUser}@${config.untisSchool}`,
        timeZone: config.timeZone,
        daysToFuture: config.daysToFuture,
        dedupPolicy: config.dedupPolicy,
        filterRule: config.filterRule,
        aggregation: config.aggregationOptions,
        render: config.renderOptions,
        notifyOptions: new Set(config.notifyOptions),
    });

    await coordinator.update();
    setInterval(() => {
        void coordinator.update();
    }, config.updateInterval);

    startServer(config.port, { store, coordinator, feeds: new FeedGenerator(config.baseUrl) });
};

main().catch(error => {
    console.error("Critical error in main execution:", error);
    process.exitCode = 1;
});
