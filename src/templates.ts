import type { ProvisionConfig } from "./types";

export const APP_SERVICE = "claude-relay";
export const APP_PORT = 3000;
export const WEBROOT = "/var/www/certbot";

export function certificatePaths(domain: string) {
  const live = `/etc/letsencrypt/live/${domain}`;
  return {
    fullchain: `${live}/fullchain.pem`,
    privkey: `${live}/privkey.pem`,
  };
}

// `$${!}` is compose's escape for a literal `${!}` in the renew loop;
// `${JWT_SECRET}` and `${ENCRYPTION_KEY}` are substituted from .env.
export function renderComposeFile(config: Pick<ProvisionConfig, "appImage">) {
  return `services:
  nginx:
    image: nginx:alpine
    container_name: crs-nginx
    restart: unless-stopped
    ports:
      - "80:80"
      - "443:443"
    volumes:
      - ./nginx/conf.d:/etc/nginx/conf.d:ro
      - ./certbot/conf:/etc/letsencrypt:ro
      - ./certbot/www:${WEBROOT}:ro
    depends_on:
      - ${APP_SERVICE}
    networks:
      - crs-network

  certbot:
    image: certbot/certbot
    container_name: crs-certbot
    volumes:
      - ./certbot/conf:/etc/letsencrypt
      - ./certbot/www:${WEBROOT}
    entrypoint: "/bin/sh -c 'trap exit TERM; while :; do certbot renew; sleep 12h & wait $$\${!}; done;'"
    networks:
      - crs-network

  ${APP_SERVICE}:
    image: ${config.appImage}
    container_name: crs-app
    restart: unless-stopped
    expose:
      - "${APP_PORT}"
    volumes:
      - ./logs:/app/logs
      - ./data:/app/data
    environment:
      - NODE_ENV=production
      - PORT=${APP_PORT}
      - HOST=0.0.0.0
      - JWT_SECRET=\${JWT_SECRET}
      - ENCRYPTION_KEY=\${ENCRYPTION_KEY}
      - REDIS_HOST=redis
      - REDIS_PORT=6379
      - TRUST_PROXY=true
      - DEFAULT_PROXY_TIMEOUT=600000
    depends_on:
      - redis
    networks:
      - crs-network

  redis:
    image: redis:7-alpine
    container_name: crs-redis
    restart: unless-stopped
    expose:
      - "6379"
    volumes:
      - ./redis_data:/data
    command: redis-server --save 60 1 --appendonly yes
    networks:
      - crs-network

networks:
  crs-network:
    driver: bridge
`;
}

/** Port 80 only: answers ACME challenges until a certificate exists. */
export function renderHttpConfig(domain: string) {
  return `server {
    listen 80;
    server_name ${domain};

    location /.well-known/acme-challenge/ {
        root ${WEBROOT};
    }

    location / {
        return 200 'Waiting for SSL setup...\\n';
        add_header Content-Type text/plain;
    }
}
`;
}

export function renderHttpsConfig(domain: string) {
  const cert = certificatePaths(domain);
  return `server {
    listen 80;
    server_name ${domain};

    location /.well-known/acme-challenge/ {
        root ${WEBROOT};
    }

    location / {
        return 301 https://$host$request_uri;
    }
}

server {
    listen 443 ssl http2;
    server_name ${domain};

    ssl_certificate ${cert.fullchain};
    ssl_certificate_key ${cert.privkey};

    ssl_protocols TLSv1.2 TLSv1.3;
    ssl_ciphers HIGH:!aNULL:!MD5;

    client_max_body_size 60M;

    location / {
        proxy_pass http://${APP_SERVICE}:${APP_PORT};
        proxy_http_version 1.1;
        proxy_set_header Upgrade $http_upgrade;
        proxy_set_header Connection "upgrade";
        proxy_set_header Host $host;
        proxy_set_header X-Real-IP $remote_addr;
        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;
        proxy_set_header X-Forwarded-Proto $scheme;
        proxy_connect_timeout 60s;
        proxy_send_timeout 600s;
        proxy_read_timeout 600s;
        proxy_buffering off;
    }
}
`;
}
