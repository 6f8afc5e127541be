export function formatTime(seconds: number): string {
    if (!Number.isFinite(seconds) || seconds < 0) return '0:00';
    const date = new Date(0);
    date.setUTCSeconds(Math.floor(seconds));
    const timeString = date.toISOString();

    // HH:MM:SS past the hour, M:SS below it
    if (seconds >= 3600) {
        return timeString.slice(11, 19);
    }
    return timeString.slice(14, 19).replace(/^0(?=\d:)/, '');
}
