const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;
const TB = GB * 1024;

export function formatBytes(bytes: number): string {
  if (bytes >= TB) {
    return `${(bytes / TB).toFixed(2)} TB`;
  }
  if (bytes >= GB) {
    return `${(bytes / GB).toFixed(2)} GB`;
  }
  if (bytes >= MB) {
    return `${(bytes / MB).toFixed(2)} MB`;
  }
  if (bytes >= KB) {
    return `${(bytes / KB).toFixed(2)} KB`;
  }
  return `${bytes} bytes`;
}

export function impactMessage(bytesShared: number): string {
  const gbShared = Math.floor(bytesShared / GB);

  if (gbShared >= 100) {
    return "Hero! You've helped hundreds of people access the open internet.";
  }
  if (gbShared >= 50) {
    return `Amazing! You've shared ${gbShared} GB, enough for a small community.`;
  }
  if (gbShared >= 10) {
    return `Great work! ${gbShared} GB shared, you're making a difference.`;
  }
  if (gbShared >= 1) {
    return `Nice start! ${gbShared} GB shared so far. Keep it up!`;
  }
  return 'Welcome! Start sharing to earn credits and help others.';
}
