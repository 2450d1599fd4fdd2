/**
 * @module options/help
 * @description Help text for the shared options.
 */

const DEFAULT_PORT = 3671;

function line(flags: string, text: string): string {
  return `  ${flags.padEnd(27)}${text}`;
}

export function commonOptionsHelp(defaultPort: number = DEFAULT_PORT): string[] {
  return [
    "Options:",
    line("--localhost <id>", "local IP/host name"),
    line("--localport <number>", "local UDP port (default system assigned)"),
    line("--port -p <number>", `UDP/TCP port on <host> (default ${defaultPort})`),
    line("--udp", "use UDP (default for unsecure communication)"),
    line("--tcp", "use TCP (default for KNX IP secure)"),
    line("--nat -n", "enable Network Address Translation"),
    line("--ft12 -f", "use FT1.2 serial communication"),
    line("--ft12-cemi", "use FT1.2 serial communication with cEMI frames"),
    line("--usb -u", "use KNX USB communication"),
    line("--tpuart", "use TP-UART communication"),
    line("--medium -m <id>", "KNX medium [tp1|p110|knxip|rf] (default tp1)"),
    line("--domain <address>", "domain address on KNX PL/RF medium (defaults to broadcast domain)"),
    line("--knx-address -k <addr>", "KNX device address of local endpoint"),
  ];
}

/**
 * @param includeGroupKey - List `--group-key`; tools without routing
 *   support leave it out.
 */
export function secureOptionsHelp(includeGroupKey = true): string[] {
  const lines = ["KNX IP Secure:"];
  if (includeGroupKey) {
    lines.push(line("--group-key <key>", "multicast group key (backbone key, 32 hexadecimal digits)"));
  }
  lines.push(
    line("--user <id>", "tunneling user identifier (1..127)"),
    line("--user-pwd <password>", "tunneling user password"),
    line("--user-key <key>", "tunneling user password hash (32 hexadecimal digits)"),
    line("--device-pwd <password>", "device authentication password"),
    line("--device-key <key>", "device authentication code (32 hexadecimal digits)"),
    line("--keyring <path>", "keyring file (default: the only *.knxkeys file in the working directory)"),
    line("--keyring-pwd <password>", "keyring password, enables keyring lookup"),
    line("--interface <addr>", "KNX IP interface address used to select keyring credentials"),
    line("--secure", "fail instead of connecting without KNX IP Secure")
  );
  return lines;
}
