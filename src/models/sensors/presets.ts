// Extraction settings for the sensors found in OH profiles
import { registerSensor } from "./registry";

const SESSION_LEVELS = ["date", "session"];

registerSensor({
    id: "heart_rate",
    name: "Heart rate (smartwatch)",
    device: "smartwatch",
    options: {
        basePath: "sensor_metrics.heart_rate",
        levelNames: SESSION_LEVELS,
        valuePaths: ["HR_BPM_stats.*", "HR_ratio_stats.*", "HR_distributions.*"],
        excludePatterns: ["HR_timeline"],
    },
    fillDistributions: true,
});

registerSensor({
    id: "wrist_activities",
    name: "Wrist activities (smartwatch)",
    device: "smartwatch",
    options: {
        basePath: "sensor_metrics.wrist_activities",
        levelNames: SESSION_LEVELS,
        valuePaths: ["WRIST_significant_rotation_percentage", "WRIST_significant_acceleration_percentage"],
    },
});

registerSensor({
    id: "noise",
    name: "Noise (smartphone)",
    device: "smartphone",
    options: {
        basePath: "sensor_metrics.noise",
        levelNames: SESSION_LEVELS,
        valuePaths: ["Noise_statistics.*", "Noise_distributions.*", "Noise_durations.*"],
        excludePatterns: ["Noise_timeline*"],
    },
});

registerSensor({
    id: "human_activities",
    name: "Human activities (smartphone)",
    device: "smartphone",
    options: {
        basePath: "sensor_metrics.human_activities",
        levelNames: SESSION_LEVELS,
        valuePaths: ["HAR_distributions.*", "HAR_durations.*", "HAR_steps.*"],
        excludePatterns: ["HAR_timeline*"],
    },
});

registerSensor({
    id: "emg",
    name: "Surface EMG sessions",
    device: "emg",
    options: {
        basePath: "sensor_metrics.emg",
        levelNames: ["date", "session", "side"],
        valuePaths: [
            "EMG_session.*",
            "EMG_intensity.*",
            "EMG_apdf.full.*",
            "EMG_apdf.active.*",
            "EMG_rest_recovery.*",
            "EMG_relative_bins.*",
        ],
        excludePatterns: ["EMG_daily_metrics", "EMG_weekly_metrics"],
    },
});
