const RULE = "=".repeat(60);

export function logHeader(message: string): void {
  console.log(`\n${RULE}\n ${message}\n${RULE}\n`);
}

export function logStep(step: number, message: string): void {
  console.log(`\n>> STEP ${step}: ${message}`);
}

export function logOk(message: string): void {
  console.log(`[OK] ${message}`);
}

export function logInfo(message: string): void {
  console.log(`[INFO] ${message}`);
}

export function logError(message: string): void {
  console.error(`[ERROR] ${message}`);
}
