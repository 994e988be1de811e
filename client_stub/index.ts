import WebSocket from 'ws';

// Usage: tsx client_stub/index.ts <on|off|status|watch> [baseUrl] [wsPath]
//        tsx client_stub/index.ts jog <a1> <a2> [baseUrl]
const [command = 'status', ...rest] = process.argv.slice(2);
const jogAngles = command === 'jog' ? rest.splice(0, 2).map(Number) : [];
const baseUrl = (rest[0] ?? 'http://localhost:8080').replace(/\/+$/, '');
const wsPath = rest[1] ?? '/events';

async function run() {
  switch (command) {
    case 'on':
    case 'off': {
      const response = await fetch(`${baseUrl}/dnd`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ active: command === 'on' })
      });
      console.log(response.status, await response.json());
      break;
    }
    case 'status': {
      const response = await fetch(`${baseUrl}/status`);
      console.log(JSON.stringify(await response.json(), null, 2));
      break;
    }
    case 'jog': {
      if (jogAngles.length !== 2 || !jogAngles.every(Number.isFinite)) {
        console.error('Usage: tsx client_stub/index.ts jog <a1> <a2> [baseUrl]');
        process.exit(1);
      }
      const response = await fetch(`${baseUrl}/actuator`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ angles: jogAngles })
      });
      console.log(response.status, await response.json());
      break;
    }
    case 'watch': {
      const ws = new WebSocket(`${baseUrl.replace(/^http/, 'ws')}${wsPath}`);
      ws.on('open', () => console.log('connected, Ctrl+C to stop'));
      ws.on('message', (data) => {
        try {
          console.log('<<', JSON.parse(data.toString()));
        } catch {
          console.log('<<', data.toString());
        }
      });
      ws.on('close', () => {
        console.log('WebSocket closed');
        process.exit(0);
      });
      ws.on('error', (error) => {
        console.error('WebSocket error', error.message);
        process.exit(1);
      });
      break;
    }
    default:
      console.error(`Unknown command: ${command}`);
      process.exit(1);
  }
}

run().catch((error) => {
  console.error('Request failed', error);
  process.exit(1);
});
