#!/usr/bin/env node

/**
 * mypv CLI – command-line interface for my-PV AC-THOR devices.
 */

import { Command } from "commander";
import { ActhorDevice } from "./device.js";
import { discover, DEVICE_NAMES } from "./discovery.js";
import { parseNetloc, type DeviceOptions } from "./config.js";
import type { EnumValue } from "./codec.js";
import { FacadeError } from "./errors.js";

interface ConnectionFlags {
  unitId: number;
  rtu: boolean;
  timeout: number;
  verbose: boolean;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function deviceOptions(netloc: string, flags: ConnectionFlags): { host: string } & DeviceOptions {
  const { host, port } = parseNetloc(netloc);
  return {
    host,
    port,
    unitId: flags.unitId,
    framing: flags.rtu ? "rtu" : "tcp",
    timeout: flags.timeout,
    verbose: flags.verbose,
  };
}

function formatEnum(value: EnumValue): string {
  return value.kind === "known" ? value.tag : `unknown (${value.raw})`;
}

/** Render a getter, or "n/a" for fields this device does not provide. */
function show(read: () => string): string {
  try {
    return read();
  } catch (err) {
    if (err instanceof FacadeError && err.reason === "unavailable") return "n/a";
    throw err;
  }
}

function summary(device: ActhorDevice): string[] {
  const status = device.status;
  return [
    `Model:          ${device.model}`,
    `Serial number:  ${device.serialNumber}`,
    `Firmware:       ${device.firmwareVersion}`,
    `Status:         ${status.category} (${status.code})`,
    `Power:          ${device.powerWatts} W`,
    `Max power:      ${device.maxPowerWatts} W`,
    `Meter power:    ${device.meterPowerWatts} W`,
    `Temperatures:   ${device.temperatures.map((t) => `${t} °C`).join(", ")}`,
    `Hot water:      ${show(() => {
      const range = device.hotWaterRange();
      return `${range.min}-${range.max} °C`;
    })}`,
    `Operation mode: ${formatEnum(device.operationMode)}`,
    `Operation:      ${formatEnum(device.operationState)}`,
    `Boost:          ${formatEnum(device.boostMode)}${device.boostActive ? " (active)" : ""}`,
    `Control type:   ${formatEnum(device.controlType)}`,
    `Voltages:       ${device.phaseVoltages.map((v) => `${v} V`).join(", ")}`,
    `Frequency:      ${device.frequencyHz} Hz`,
  ];
}

function withConnectionOptions(command: Command): Command {
  return command
    .option(
      "-u, --unit-id <number>",
      "Modbus unit ID",
      (v: string) => parseInt(v, 10),
      1
    )
    .option("--rtu", "Send RTU frames (serial-to-TCP gateway)", false)
    .option(
      "-t, --timeout <number>",
      "Request timeout in milliseconds",
      (v: string) => parseInt(v, 10),
      5000
    )
    .option("-v, --verbose", "Enable verbose logging", false);
}

const program = new Command();

program
  .name("mypv")
  .description("CLI for my-PV AC-THOR power diverters over Modbus TCP")
  .version("1.0.0");

// ---------- read ----------

withConnectionOptions(
  program
    .command("read")
    .description("Read the device state once")
    .argument("<host>", "Device address as host[:port]")
    .option("--json", "Print the raw snapshot as JSON", false)
).action(async (netloc: string, flags: ConnectionFlags & { json: boolean }) => {
  const { host, ...options } = deviceOptions(netloc, flags);
  let device: ActhorDevice | undefined;
  try {
    device = await ActhorDevice.connect(host, options);
    if (flags.json) {
      console.log(JSON.stringify(device.snapshot, null, 2));
    } else {
      console.log(summary(device).join("\n"));
    }
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  } finally {
    await device?.close();
  }
});

// ---------- watch ----------

withConnectionOptions(
  program
    .command("watch")
    .description("Poll the device continuously until interrupted")
    .argument("<host>", "Device address as host[:port]")
    .option(
      "-i, --interval <number>",
      "Poll interval in milliseconds",
      (v: string) => parseInt(v, 10),
      5000
    )
).action(async (netloc: string, flags: ConnectionFlags & { interval: number }) => {
  const { host, ...options } = deviceOptions(netloc, flags);
  let device: ActhorDevice | undefined;
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());
  try {
    device = await ActhorDevice.connect(host, options);
    const watched = device;
    console.log(`Watching ${watched.model} (${watched.serialNumber})`);
    await watched.run({
      interval: flags.interval,
      signal: controller.signal,
      onSnapshot: (snapshot) => {
        const time = new Date(snapshot.timestamp).toISOString();
        console.log(
          `${time}  power ${watched.powerWatts} W  meter ${watched.meterPowerWatts} W  ` +
            `temp ${watched.temperatures[0]} °C  ${formatEnum(watched.operationState)}`
        );
      },
      onStateChange: (state, previous) => {
        console.log(`Connection ${previous} -> ${state}`);
      },
      onError: (err) => {
        console.error(`Poll failed: ${err.message}`);
      },
    });
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  } finally {
    await device?.close();
  }
});

// ---------- set-power ----------

withConnectionOptions(
  program
    .command("set-power")
    .description("Set the power setpoint in watts")
    .argument("<host>", "Device address as host[:port]")
    .argument("<watts>", "Power in W (0-4294967295)", (v: string) => Number(v))
).action(async (netloc: string, watts: number, flags: ConnectionFlags) => {
  const { host, ...options } = deviceOptions(netloc, flags);
  let device: ActhorDevice | undefined;
  try {
    device = await ActhorDevice.connect(host, options);
    await device.setPower(watts);
    console.log(`Power set to ${watts} W`);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  } finally {
    await device?.close();
  }
});

// ---------- discover ----------

program
  .command("discover")
  .description("Discover my-PV devices on the local network")
  .option("-a, --address <ip>", "Broadcast address", "255.255.255.255")
  .option(
    "-t, --timeout <number>",
    "Time to wait for replies in milliseconds",
    (v: string) => parseInt(v, 10),
    5000
  )
  .option("-v, --verbose", "Enable verbose logging", false)
  .action(async (opts: { address: string; timeout: number; verbose: boolean }) => {
    try {
      const replies = await discover(opts);
      if (replies.length === 0) {
        console.log("No devices found.");
      } else {
        for (const reply of replies) {
          const name = DEVICE_NAMES[reply.deviceId] ?? `0x${reply.deviceId.toString(16)}`;
          console.log(
            `IP: ${reply.address}  Device: ${name}  Serial: ${reply.serialNumber}  ` +
              `Firmware: ${reply.firmwareVersion}`
          );
        }
      }
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exitCode = 1;
    }
  });

await program.parseAsync();
