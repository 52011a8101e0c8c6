// scripts.ts
// Fed to `sudo env K8S_SERIES=... bash -s` on stdin; nothing is interpolated here.
export const PROVISION_NODE = String.raw`
set -euo pipefail
export DEBIAN_FRONTEND=noninteractive
: "${"${K8S_SERIES:?K8S_SERIES is required}"}"

# 0) Clean any stale Kubernetes repo first
rm -f /etc/apt/sources.list.d/kubernetes.list /etc/apt/keyrings/kubernetes-apt-keyring.gpg || true

# 1) Base deps
apt-get update -y
apt-get install -y ca-certificates curl gnupg lsb-release apt-transport-https
install -m 0755 -d /etc/apt/keyrings

# 2) Disable swap (and persist)
swapoff -a || true
sed -i.bak '/\sswap\s/d' /etc/fstab || true

# 3) Kernel modules + sysctl
cat >/etc/modules-load.d/k8s.conf <<'EOF'
overlay
br_netfilter
EOF
modprobe overlay || true
modprobe br_netfilter || true

cat >/etc/sysctl.d/99-kubernetes-cri.conf <<'EOF'
net.bridge.bridge-nf-call-iptables  = 1
net.ipv4.ip_forward                 = 1
net.bridge.bridge-nf-call-ip6tables = 1
EOF
sysctl --system >/dev/null

# 4) containerd
apt-get install -y containerd
mkdir -p /etc/containerd
containerd config default | tee /etc/containerd/config.toml >/dev/null
sed -i 's/^\s*SystemdCgroup = false/\tSystemdCgroup = true/' /etc/containerd/config.toml
systemctl enable --now containerd
systemctl restart containerd

# 5) kube tools from pkgs.k8s.io
curl -fsSL "https://pkgs.k8s.io/core:/stable:/${"${K8S_SERIES}"}/deb/Release.key" \
  | gpg --dearmor --batch --yes -o /etc/apt/keyrings/kubernetes-apt-keyring.gpg
chmod 0644 /etc/apt/keyrings/kubernetes-apt-keyring.gpg
cat >/etc/apt/sources.list.d/kubernetes.list <<EOF
deb [signed-by=/etc/apt/keyrings/kubernetes-apt-keyring.gpg] https://pkgs.k8s.io/core:/stable:/${"${K8S_SERIES}"}/deb/ /
EOF
apt-get update -y
apt-get install -y kubelet kubeadm kubectl
apt-mark hold kubelet kubeadm kubectl || true

# 6) kubelet must advertise the host-only address, not the NAT one
if [ -n "${"${NODE_IP:-}"}" ]; then
  echo "KUBELET_EXTRA_ARGS=--node-ip=${"${NODE_IP}"}" > /etc/default/kubelet
  systemctl restart kubelet || true
fi
`;
